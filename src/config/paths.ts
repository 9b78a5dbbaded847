/**
 * Rollcall — Paths
 *
 * The tool directory holds config.yaml. `ROLLCALL_HOME` points it somewhere
 * else (CI runners, several labs on one machine); otherwise it is
 * ~/.rollcall, or %APPDATA%\rollcall on Windows.
 */

import { join } from 'node:path'
import { homedir } from 'node:os'

export function rollcallHome(env: NodeJS.ProcessEnv = process.env): string {
  if (env.ROLLCALL_HOME) return env.ROLLCALL_HOME
  if (process.platform === 'win32') {
    return join(env.APPDATA || join(homedir(), 'AppData', 'Roaming'), 'rollcall')
  }
  return join(homedir(), '.rollcall')
}

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(rollcallHome(env), 'config.yaml')
}
