import type { TopologyRecord } from '../src/topology/types.js'
import type { CheckDefinition, OverrideEntry } from '../src/checks/types.js'
import { buildRegistry } from '../src/topology/classifier.js'

export const TOPOLOGY: TopologyRecord[] = [
  { name: 'dc', address: '10.0.0.1', role: 'windows-dc' },
  { name: 'web1', address: '10.0.0.2', role: 'linux-web' },
]

export function registry(records: TopologyRecord[] = TOPOLOGY) {
  return buildRegistry(records)
}

export function override(
  serviceOverrides: Record<string, CheckDefinition[]> = {},
  extraChecks: CheckDefinition[] = []
): OverrideEntry {
  return { serviceOverrides: new Map(Object.entries(serviceOverrides)), extraChecks }
}
