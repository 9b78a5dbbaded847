/**
 * Rollcall — Inventory Renderer
 *
 * Ansible INI inventory:
 *   [linux] / [windows]   one line per host with address and services
 *   [<role group>]        one group per role tag, e.g. [windows_dc]
 *   [<service>]           one group per service that reaches any host
 *   [<group>:vars]        configured connection variables
 */

import type { ResolvedBox } from '../checks/types.js'
import type { HostServices } from '../services/reverse.js'
import type { OsClass } from '../topology/types.js'
import type { Scalar } from '../config/types.js'

export type GroupVars = Readonly<Record<string, Readonly<Record<string, Scalar>>>>

const CLASS_GROUPS: readonly [OsClass, string][] = [
  ['LINUX', 'linux'],
  ['WINDOWS', 'windows'],
]

const HEADER = [
  '# Ansible inventory generated by rollcall.',
  '# Do not edit by hand: changes are overwritten on the next run.',
]

// Group names the lab playbooks target with --limit
const ROLE_GROUPS: Readonly<Record<string, string>> = {
  scoring: 'scoring',
  'windows-dc': 'windows_dc',
  'windows-member': 'blue_windows_members',
  'linux-member': 'blue_linux_members',
}

/** Ansible group for a role tag; other tags keep their name with `-` as `_` */
export function roleGroup(role: string): string {
  if (Object.hasOwn(ROLE_GROUPS, role)) return ROLE_GROUPS[role]
  return role.replace(/[^A-Za-z0-9_]/g, '_')
}

// The INI parser splits host lines shell-style, so the list is single-quoted
// to reach Ansible as a list literal rather than a bare string.
export function renderHostLine(box: ResolvedBox, services: readonly string[]): string {
  const parts = [box.name, `address=${box.address}`]
  if (box.publicAddress) parts.push(`ansible_host=${box.publicAddress}`)
  parts.push(`services='${JSON.stringify(services)}'`)
  return parts.join(' ')
}

/** service → sorted hosts, for services that reach at least one host */
function serviceGroups(hostServices: HostServices): Map<string, string[]> {
  const groups = new Map<string, string[]>()
  for (const [host, services] of hostServices) {
    for (const service of services) {
      const members = groups.get(service)
      if (members) members.push(host)
      else groups.set(service, [host])
    }
  }

  const sorted = new Map<string, string[]>()
  for (const service of [...groups.keys()].sort()) {
    sorted.set(service, (groups.get(service) ?? []).sort())
  }
  return sorted
}

export function renderInventory(
  hostServices: HostServices,
  boxes: readonly ResolvedBox[],
  groupVars: GroupVars = {}
): string {
  const blocks: string[][] = [HEADER]
  const sortedBoxes = [...boxes].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

  for (const [osClass, group] of CLASS_GROUPS) {
    const members = sortedBoxes.filter((box) => box.osClass === osClass)
    if (members.length === 0) continue
    blocks.push([`[${group}]`, ...members.map((box) => renderHostLine(box, hostServices.get(box.name) ?? []))])
  }

  const roleGroups = new Map<string, string[]>()
  for (const box of sortedBoxes) {
    const group = roleGroup(box.role)
    const members = roleGroups.get(group)
    if (members) members.push(box.name)
    else roleGroups.set(group, [box.name])
  }
  for (const group of [...roleGroups.keys()].sort()) {
    blocks.push([`[${group}]`, ...(roleGroups.get(group) ?? [])])
  }

  for (const [service, hosts] of serviceGroups(hostServices)) {
    blocks.push([`[${service}]`, ...hosts])
  }

  for (const group of Object.keys(groupVars).sort()) {
    const vars = groupVars[group] ?? {}
    const keys = Object.keys(vars).sort()
    if (keys.length === 0) continue
    blocks.push([`[${group}:vars]`, ...keys.map((key) => `${key}=${String(vars[key])}`)])
  }

  return blocks.map((lines) => lines.join('\n')).join('\n\n') + '\n'
}
