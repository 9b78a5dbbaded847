/**
 * Rollcall — Topology Classifier
 *
 * Builds the host registry from the provisioning feed and assigns each
 * host an OS class from its role tag. Any failure here aborts the run:
 * a partial topology is useless downstream.
 */

import { TopologyError } from '../errors.js'
import type { Host, HostRegistry, OsClass, TopologyRecord } from './types.js'

type RoleRule =
  | { prefix: string; osClass: OsClass }
  | { exact: string; osClass: OsClass }

/** Closed table of role tags. First match wins. */
export const ROLE_RULES: readonly RoleRule[] = [
  { prefix: 'windows-', osClass: 'WINDOWS' },
  { prefix: 'linux-', osClass: 'LINUX' },
  { exact: 'scoring', osClass: 'LINUX' },
]

function matches(rule: RoleRule, tag: string): boolean {
  if ('exact' in rule) return tag === rule.exact
  return tag.startsWith(rule.prefix) && tag.length > rule.prefix.length
}

/** OS class for a role tag, or null when no rule covers it */
export function classifyRole(tag: string): OsClass | null {
  const rule = ROLE_RULES.find((r) => matches(r, tag))
  return rule ? rule.osClass : null
}

export function buildRegistry(feed: readonly TopologyRecord[]): HostRegistry {
  const registry = new Map<string, Host>()

  for (const record of feed) {
    if (registry.has(record.name)) {
      throw new TopologyError('DuplicateHost', record.name, `Host '${record.name}' appears more than once in the topology`)
    }

    const osClass = classifyRole(record.role)
    if (!osClass) {
      throw new TopologyError(
        'UnknownRoleTag',
        record.name,
        `Host '${record.name}' has unknown role tag '${record.role}'`
      )
    }

    registry.set(record.name, { ...record, osClass })
  }

  return registry
}

/** Sorted names of every host in the registry */
export function allHostNames(registry: HostRegistry): string[] {
  return [...registry.keys()].sort()
}

/** Sorted names of the hosts of one OS class */
export function hostsOfClass(registry: HostRegistry, osClass: OsClass): string[] {
  const names: string[] = []
  for (const host of registry.values()) {
    if (host.osClass === osClass) names.push(host.name)
  }
  return names.sort()
}
