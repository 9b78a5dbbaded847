import { describe, it, expect } from 'vitest'
import { runPipeline, resolveLab, type PipelineInput } from '../src/pipeline.js'
import type { CheckDefinition } from '../src/checks/types.js'
import { TopologyError } from '../src/errors.js'
import { TOPOLOGY, override } from './fixtures.js'

const WEB: CheckDefinition = { type: 'web', urls: [{ path: '/', status: 200 }] }

function labInput(overrides: PipelineInput['overrides'] = new Map()): PipelineInput {
  return {
    topology: TOPOLOGY,
    assignment: new Map([
      ['ssh', []],
      ['winrm', []],
      ['web', ['web1']],
    ]),
    defaults: new Map([
      ['ssh', [{ type: 'ssh' }]],
      ['winrm', [{ type: 'winrm' }]],
      ['web', [WEB]],
    ]),
    overrides,
  }
}

describe('runPipeline', () => {
  it('resolves the two-host lab end to end', () => {
    const result = runPipeline(labInput())
    if (!result.ok) throw new Error('expected a clean run')

    expect([...result.lab.expanded.entries()]).toEqual([
      ['ssh', ['web1']],
      ['web', ['web1']],
      ['winrm', ['dc']],
    ])
    expect([...result.lab.hostServices.entries()]).toEqual([
      ['dc', ['winrm']],
      ['web1', ['ssh', 'web']],
    ])
    expect(result.lab.boxes.find((b) => b.name === 'web1')?.checks).toEqual([{ type: 'ssh' }, WEB])
    expect(result.warnings).toEqual([])
  })

  it('renders both artifacts from the resolved lab', () => {
    const result = runPipeline(labInput(), { engine: { event: 'test' } })
    if (!result.ok) throw new Error('expected a clean run')

    expect(result.artifacts.inventory).toContain('[winrm]\ndc\n')
    expect(result.artifacts.checks).toContain('[[box]]\nname = "dc"\nip = "10.0.0.1"\n\n  [[box.winrm]]\n')
    expect(result.artifacts.rdp.size).toBe(0)
  })

  it('produces byte-identical artifacts on repeated runs', () => {
    const first = runPipeline(labInput())
    const second = runPipeline(labInput())
    if (!first.ok || !second.ok) throw new Error('expected clean runs')

    expect(second.artifacts.inventory).toBe(first.artifacts.inventory)
    expect(second.artifacts.checks).toBe(first.artifacts.checks)
  })

  it('blocks all artifacts on an unknown host reference', () => {
    const input = labInput()
    const result = runPipeline({ ...input, assignment: new Map([['web', ['ghost-host']]]) })

    expect(result.ok).toBe(false)
    expect('artifacts' in result).toBe(false)
    if (result.ok) return
    expect(result.errors).toEqual([{ kind: 'UnknownHostReference', severity: 'error', service: 'web', host: 'ghost-host' }])
  })

  it('blocks output on a duplicate identity introduced by extra checks', () => {
    const result = runPipeline(labInput(new Map([['web1', override({}, [{ type: 'ssh' }])]])))

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.errors).toEqual([
      { kind: 'DuplicateCheckIdentity', severity: 'error', host: 'web1', type: 'ssh', display: '' },
    ])
  })

  it('reports orphaned overrides as warnings and still renders', () => {
    const result = runPipeline(labInput(new Map([['web1', override({ ftp: [{ type: 'ftp' }] })]])))

    expect(result.ok).toBe(true)
    expect(result.warnings).toEqual([
      { kind: 'OrphanedServiceOverride', severity: 'warning', host: 'web1', service: 'ftp' },
    ])
  })

  it('collects every fatal problem in one run', () => {
    const input = labInput(new Map([['ghost', override()], ['web1', override({}, [{ type: 'web' }])]]))
    const result = runPipeline({
      ...input,
      assignment: new Map<string, readonly string[]>([...input.assignment, ['dns', ['nowhere']]]),
    })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.errors.map((e) => e.kind)).toEqual(['UnknownHostReference', 'DuplicateCheckIdentity', 'UnknownOverrideHost'])
  })

  it('renders RDP files only when asked', () => {
    const input = labInput()
    const result = runPipeline({ ...input, assignment: new Map([['rdp', []]]) }, { rdp: {} })
    if (!result.ok) throw new Error('expected a clean run')

    expect([...result.artifacts.rdp.keys()]).toEqual(['dc.rdp'])
  })
})

describe('resolveLab', () => {
  it('aborts on an unclassifiable role tag', () => {
    const input = labInput()
    expect(() => resolveLab({ ...input, topology: [...TOPOLOGY, { name: 'kali1', address: '10.0.0.9', role: 'kali' }] })).toThrow(
      TopologyError
    )
  })
})
