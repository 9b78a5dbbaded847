/**
 * Rollcall — Config Defaults
 */

import type { RollcallConfig } from './types.js'

export const DEFAULT_CONFIG: RollcallConfig = {
  lab_dir: 'lab',
  output: {
    dir: 'out',
    inventory: 'inventory.ini',
    checks: 'dwayne.conf',
    rdp_dir: 'rdp',
  },
  inventory: {
    group_vars: {
      linux: {
        ansible_python_interpreter: '/usr/bin/python3',
      },
      windows: {
        ansible_connection: 'winrm',
        ansible_winrm_transport: 'ntlm',
        ansible_winrm_server_cert_validation: 'ignore',
      },
    },
  },
  engine: {},
  rdp: {},
  log: {
    level: 'info',
  },
}
