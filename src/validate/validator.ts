/**
 * Rollcall — Validator
 *
 * Runs over the resolved boxes before anything is rendered. Every host
 * and every override is visited so one run reports all problems.
 */

import type { HostRegistry } from '../topology/types.js'
import type { ExpandedAssignment } from '../services/resolver.js'
import type { CheckDefinition, OverrideTable, ResolvedBox } from '../checks/types.js'
import {
  duplicateCheckIdentity,
  orphanedServiceOverride,
  unknownOverrideHost,
  type Diagnostic,
} from './diagnostics.js'

export type ValidationInput = {
  boxes: readonly ResolvedBox[]
  overrides: OverrideTable
  registry: HostRegistry
  expanded: ExpandedAssignment
}

/** `(type, display-or-empty)`: the scoring engine names checks by this pair */
export function checkIdentity(check: CheckDefinition): [type: string, display: string] {
  return [check.type, check.display ?? '']
}

export function findDuplicateIdentities(box: ResolvedBox): Diagnostic[] {
  const seen = new Map<string, number>()
  const diagnostics: Diagnostic[] = []

  for (const check of box.checks) {
    const [type, display] = checkIdentity(check)
    const key = `${type}\u0000${display}`
    const count = (seen.get(key) ?? 0) + 1
    seen.set(key, count)
    // report once per identity, on its second occurrence
    if (count === 2) diagnostics.push(duplicateCheckIdentity(box.name, type, display))
  }

  return diagnostics
}

export function validateResolution(input: ValidationInput): Diagnostic[] {
  const diagnostics: Diagnostic[] = []

  for (const box of input.boxes) {
    diagnostics.push(...findDuplicateIdentities(box))
  }

  for (const host of [...input.overrides.keys()].sort()) {
    if (!input.registry.has(host)) {
      diagnostics.push(unknownOverrideHost(host))
    }

    const entry = input.overrides.get(host)
    if (!entry) continue
    for (const service of [...entry.serviceOverrides.keys()].sort()) {
      const hosts = input.expanded.get(service)
      if (!hosts || hosts.length === 0) {
        diagnostics.push(orphanedServiceOverride(host, service))
      }
    }
  }

  return diagnostics
}
