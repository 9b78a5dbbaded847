/**
 * Rollcall — Reverse Mapping
 *
 * Inverts the expanded assignment into host → services. Every registry
 * host gets an entry, even with nothing assigned, and every list is
 * sorted: this sort is what makes repeated runs byte-identical.
 */

import type { HostRegistry } from '../topology/types.js'
import type { ExpandedAssignment } from './resolver.js'

/** host → sorted service names, keys in sorted order */
export type HostServices = ReadonlyMap<string, readonly string[]>

export function buildHostServices(expanded: ExpandedAssignment, registry: HostRegistry): HostServices {
  const byHost = new Map<string, string[]>()
  for (const name of registry.keys()) byHost.set(name, [])

  for (const [service, hosts] of expanded) {
    for (const host of hosts) {
      const services = byHost.get(host)
      if (services) {
        services.push(service)
      } else {
        byHost.set(host, [service])
      }
    }
  }

  const result = new Map<string, readonly string[]>()
  for (const host of [...byHost.keys()].sort()) {
    const services = byHost.get(host) ?? []
    result.set(host, [...new Set(services)].sort())
  }
  return result
}

/** Services that reach at least one host */
export function assignedServices(hostServices: HostServices): string[] {
  const services = new Set<string>()
  for (const list of hostServices.values()) list.forEach((s) => services.add(s))
  return [...services].sort()
}
