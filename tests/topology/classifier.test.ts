import { describe, it, expect } from 'vitest'
import { buildRegistry, classifyRole, hostsOfClass, allHostNames } from '../../src/topology/classifier.js'
import { TopologyError } from '../../src/errors.js'

describe('classifyRole', () => {
  it('classifies windows-* tags as WINDOWS', () => {
    expect(classifyRole('windows-dc')).toBe('WINDOWS')
    expect(classifyRole('windows-member')).toBe('WINDOWS')
  })

  it('classifies linux-* and scoring as LINUX', () => {
    expect(classifyRole('linux-web')).toBe('LINUX')
    expect(classifyRole('scoring')).toBe('LINUX')
  })

  it('returns null for tags outside the table', () => {
    expect(classifyRole('windows')).toBeNull()
    expect(classifyRole('kali')).toBeNull()
    expect(classifyRole('Windows-dc')).toBeNull()
  })
})

describe('buildRegistry', () => {
  it('keys hosts by name and attaches the OS class', () => {
    const registry = buildRegistry([
      { name: 'dc', address: '10.0.0.1', role: 'windows-dc', publicAddress: '100.64.0.1' },
      { name: 'web1', address: '10.0.0.2', role: 'linux-web' },
    ])

    expect(registry.size).toBe(2)
    expect(registry.get('dc')).toEqual({
      name: 'dc',
      address: '10.0.0.1',
      role: 'windows-dc',
      publicAddress: '100.64.0.1',
      osClass: 'WINDOWS',
    })
    expect(registry.get('web1')?.osClass).toBe('LINUX')
  })

  it('fails the whole topology on an unknown role tag', () => {
    const build = () =>
      buildRegistry([
        { name: 'web1', address: '10.0.0.2', role: 'linux-web' },
        { name: 'kali1', address: '10.0.0.9', role: 'kali' },
      ])

    expect(build).toThrow(TopologyError)
    expect(build).toThrow("Host 'kali1' has unknown role tag 'kali'")
  })

  it('reports the UnknownRoleTag code', () => {
    try {
      buildRegistry([{ name: 'x', address: '10.0.0.3', role: 'router' }])
      expect.unreachable()
    } catch (err) {
      if (!(err instanceof TopologyError)) throw err
      expect(err.code).toBe('UnknownRoleTag')
      expect(err.host).toBe('x')
    }
  })

  it('rejects a host name that appears twice', () => {
    expect(() =>
      buildRegistry([
        { name: 'web1', address: '10.0.0.2', role: 'linux-web' },
        { name: 'web1', address: '10.0.0.3', role: 'linux-web' },
      ])
    ).toThrow("Host 'web1' appears more than once in the topology")
  })
})

describe('host selection', () => {
  const registry = buildRegistry([
    { name: 'web2', address: '10.0.0.3', role: 'linux-web' },
    { name: 'dc', address: '10.0.0.1', role: 'windows-dc' },
    { name: 'db', address: '10.0.0.4', role: 'linux-db' },
    { name: 'fs', address: '10.0.0.5', role: 'windows-member' },
  ])

  it('lists hosts of one class in sorted order', () => {
    expect(hostsOfClass(registry, 'LINUX')).toEqual(['db', 'web2'])
    expect(hostsOfClass(registry, 'WINDOWS')).toEqual(['dc', 'fs'])
  })

  it('lists every host in sorted order', () => {
    expect(allHostNames(registry)).toEqual(['db', 'dc', 'fs', 'web2'])
  })
})
