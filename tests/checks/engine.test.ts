import { describe, it, expect } from 'vitest'
import { resolveBoxes, resolveHostChecks, checksForService } from '../../src/checks/engine.js'
import type { CheckDefinition } from '../../src/checks/types.js'
import { override, registry } from '../fixtures.js'

const SSH: CheckDefinition = { type: 'ssh' }
const WEB: CheckDefinition = { type: 'web', urls: [{ path: '/', status: 200 }] }
const WINRM: CheckDefinition = { type: 'winrm' }

const defaults = new Map<string, CheckDefinition[]>([
  ['ssh', [SSH]],
  ['web', [WEB]],
  ['winrm', [WINRM]],
])

describe('checksForService', () => {
  it('uses the default table when the host has no override', () => {
    expect(checksForService('web', defaults, undefined)).toEqual([WEB])
  })

  it('replaces the default list with the override, not merging fields', () => {
    const custom: CheckDefinition = { type: 'web', display: 'portal', port: 8080 }
    const entry = override({ web: [custom] })

    expect(checksForService('web', defaults, entry)).toEqual([custom])
  })

  it('lets an override supply checks for a default-less service', () => {
    const ftp: CheckDefinition = { type: 'ftp', anonymous: true }
    expect(checksForService('ftp', defaults, override({ ftp: [ftp] }))).toEqual([ftp])
  })

  it('yields nothing for a service with neither default nor override', () => {
    expect(checksForService('ftp', defaults, override())).toEqual([])
  })

  it('treats an empty override list as "no checks for this service"', () => {
    expect(checksForService('web', defaults, override({ web: [] }))).toEqual([])
  })
})

describe('resolveHostChecks', () => {
  it('keeps service order and appends extra checks last', () => {
    const extra: CheckDefinition = { type: 'cmd', display: 'flag', commands: [{ command: 'cat /flag' }] }
    const checks = resolveHostChecks(['ssh', 'web'], defaults, override({}, [extra]))

    expect(checks).toEqual([SSH, WEB, extra])
  })

  it('appends extra checks even when a service override fired', () => {
    const custom: CheckDefinition = { type: 'web', display: 'portal' }
    const extra: CheckDefinition = { type: 'tcp', port: 9000 }

    expect(resolveHostChecks(['ssh', 'web'], defaults, override({ web: [custom] }, [extra]))).toEqual([SSH, custom, extra])
  })

  it('appends extra checks for a host with no services', () => {
    const extra: CheckDefinition = { type: 'ping' }
    expect(resolveHostChecks([], defaults, override({}, [extra]))).toEqual([extra])
  })

  it('does not re-sort checks by type', () => {
    const zeta: CheckDefinition = { type: 'zeta' }
    const alpha: CheckDefinition = { type: 'alpha' }
    const table = new Map([['svc', [zeta, alpha]]])
    expect(resolveHostChecks(['svc'], table, undefined)).toEqual([zeta, alpha])
  })
})

describe('resolveBoxes', () => {
  it('builds one box per host with address and merged checks', () => {
    const hostServices = new Map([
      ['dc', ['winrm']],
      ['web1', ['ssh', 'web']],
    ])

    const boxes = resolveBoxes(hostServices, registry(), defaults, new Map())

    expect(boxes).toEqual([
      { name: 'dc', address: '10.0.0.1', role: 'windows-dc', osClass: 'WINDOWS', checks: [WINRM] },
      { name: 'web1', address: '10.0.0.2', role: 'linux-web', osClass: 'LINUX', checks: [SSH, WEB] },
    ])
  })

  it('carries the public address when the host has one', () => {
    const reg = registry([{ name: 'web1', address: '10.0.0.2', role: 'linux-web', publicAddress: '100.64.0.2' }])
    const [box] = resolveBoxes(new Map([['web1', ['ssh']]]), reg, defaults, new Map())
    expect(box?.publicAddress).toBe('100.64.0.2')
  })

  it('applies overrides only to their own host', () => {
    const custom: CheckDefinition = { type: 'ssh', display: 'hardened', port: 2222 }
    const hostServices = new Map([
      ['dc', ['ssh']],
      ['web1', ['ssh']],
    ])

    const boxes = resolveBoxes(hostServices, registry(), defaults, new Map([['web1', override({ ssh: [custom] })]]))

    expect(boxes.map((b) => b.checks)).toEqual([[SSH], [custom]])
  })
})
