/**
 * Rollcall — Check Resolution Engine
 *
 * Merge order per host:
 *   1. each assigned service, in sorted order:
 *        host override for the service  → replaces the default list
 *        else default table entry        → used as-is
 *        else                            → nothing (not an error)
 *   2. the host's extra checks, always, in authored order
 *
 * Check records are copied by reference and never inspected.
 */

import type { HostRegistry } from '../topology/types.js'
import type { HostServices } from '../services/reverse.js'
import type { CheckDefinition, DefaultCheckTable, OverrideEntry, OverrideTable, ResolvedBox } from './types.js'

/** Checks contributed by one service on one host */
export function checksForService(
  service: string,
  defaults: DefaultCheckTable,
  override: OverrideEntry | undefined
): readonly CheckDefinition[] {
  const replaced = override?.serviceOverrides.get(service)
  if (replaced) return replaced
  return defaults.get(service) ?? []
}

export function resolveHostChecks(
  services: readonly string[],
  defaults: DefaultCheckTable,
  override: OverrideEntry | undefined
): CheckDefinition[] {
  const checks: CheckDefinition[] = []
  for (const service of services) {
    checks.push(...checksForService(service, defaults, override))
  }
  if (override) checks.push(...override.extraChecks)
  return checks
}

/**
 * One box per host in `hostServices`, in its (sorted) key order. Hosts
 * missing from the registry are skipped; the resolver never lets one through.
 */
export function resolveBoxes(
  hostServices: HostServices,
  registry: HostRegistry,
  defaults: DefaultCheckTable,
  overrides: OverrideTable
): ResolvedBox[] {
  const boxes: ResolvedBox[] = []

  for (const [name, services] of hostServices) {
    const host = registry.get(name)
    if (!host) continue

    const box: ResolvedBox = {
      name,
      address: host.address,
      role: host.role,
      osClass: host.osClass,
      checks: resolveHostChecks(services, defaults, overrides.get(name)),
    }
    if (host.publicAddress !== undefined) box.publicAddress = host.publicAddress
    boxes.push(box)
  }

  return boxes
}
