/**
 * Rollcall — Service Assignment Resolver
 *
 * Expands the authored service → hosts mapping. An explicit host list is
 * taken as written; an empty one means "default hosts" for the four
 * built-in services and "nobody" for everything else.
 */

import { allHostNames, hostsOfClass } from '../topology/classifier.js'
import type { HostRegistry } from '../topology/types.js'
import { unknownHostReference, type UnknownHostReference } from '../validate/diagnostics.js'

/** Authored mapping: service → explicit host names (possibly empty) */
export type ServiceAssignment = ReadonlyMap<string, readonly string[]>

/** Fully materialized mapping: service → sorted host names */
export type ExpandedAssignment = ReadonlyMap<string, readonly string[]>

export type HostSelector = (registry: HostRegistry) => string[]

/** Services whose empty assignment expands to a default host set */
export const DEFAULT_EXPANSION_RULES: ReadonlyMap<string, HostSelector> = new Map<string, HostSelector>([
  ['ping', (registry) => allHostNames(registry)],
  ['ssh', (registry) => hostsOfClass(registry, 'LINUX')],
  ['winrm', (registry) => hostsOfClass(registry, 'WINDOWS')],
  ['rdp', (registry) => hostsOfClass(registry, 'WINDOWS')],
])

export type AssignmentResolution = {
  expanded: ExpandedAssignment
  diagnostics: UnknownHostReference[]
}

/** Registry host whose name differs from `name` only in letter case */
function caseInsensitiveMatch(registry: HostRegistry, name: string): string | undefined {
  const lowered = name.toLowerCase()
  for (const candidate of registry.keys()) {
    if (candidate.toLowerCase() === lowered) return candidate
  }
  return undefined
}

export function resolveAssignments(assignment: ServiceAssignment, registry: HostRegistry): AssignmentResolution {
  const expanded = new Map<string, readonly string[]>()
  const diagnostics: UnknownHostReference[] = []

  for (const service of [...assignment.keys()].sort()) {
    const explicit = assignment.get(service) ?? []

    if (explicit.length === 0) {
      const rule = DEFAULT_EXPANSION_RULES.get(service)
      expanded.set(service, rule ? rule(registry) : [])
      continue
    }

    const hosts = new Set<string>()
    for (const host of explicit) {
      if (registry.has(host)) {
        hosts.add(host)
      } else {
        diagnostics.push(unknownHostReference(service, host, caseInsensitiveMatch(registry, host)))
      }
    }
    expanded.set(service, [...hosts].sort())
  }

  return { expanded, diagnostics }
}
