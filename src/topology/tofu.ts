/**
 * Rollcall — Provisioning Feed
 *
 * Reads `tofu output -json` and turns it into a topology feed plus the
 * service assignment the infrastructure declares in `service_hosts`.
 *
 *   scoring_*        → role `scoring`
 *   blue_windows_*   → first VM `windows-dc`, the rest `windows-member`
 *   blue_linux_*     → `linux-member`
 *
 * Red team VMs are attack boxes and are never scored, so they are left out.
 */

import { execFileSync } from 'node:child_process'
import { readFileSync } from 'node:fs'
import { z } from 'zod'
import { FeedError, formatIssues } from '../errors.js'
import type { TopologyRecord } from './types.js'

const stringList = z.object({ value: z.array(z.string()) })

const tofuOutputSchema = z.object({
  scoring_names: stringList.optional(),
  scoring_ips: stringList.optional(),
  scoring_floating_ips: stringList.optional(),
  blue_windows_names: stringList.optional(),
  blue_windows_ips: stringList.optional(),
  blue_windows_floating_ips: stringList.optional(),
  blue_linux_names: stringList.optional(),
  blue_linux_ips: stringList.optional(),
  blue_linux_floating_ips: stringList.optional(),
  service_hosts: z.object({ value: z.record(z.string(), z.array(z.string())) }).optional(),
})

type TofuOutput = z.infer<typeof tofuOutputSchema>

export type ProvisioningFeed = {
  topology: TopologyRecord[]
  assignment: Map<string, string[]>
}

type VmGroup = {
  names: string[]
  ips: string[]
  floatingIps: string[]
  role: (index: number) => string
}

function groupRecords(group: VmGroup): TopologyRecord[] {
  return group.names.map((name, i) => {
    const address = group.ips[i]
    if (address === undefined) {
      throw new FeedError(`no internal address for '${name}'`)
    }
    const record: TopologyRecord = { name, address, role: group.role(i) }
    const floating = group.floatingIps[i]
    if (floating !== undefined) record.publicAddress = floating
    return record
  })
}

export function parseTofuOutput(doc: unknown): ProvisioningFeed {
  const result = tofuOutputSchema.safeParse(doc)
  if (!result.success) {
    throw new FeedError(formatIssues(result.error.issues))
  }
  const out: TofuOutput = result.data

  const groups: VmGroup[] = [
    {
      names: out.scoring_names?.value ?? [],
      ips: out.scoring_ips?.value ?? [],
      floatingIps: out.scoring_floating_ips?.value ?? [],
      role: () => 'scoring',
    },
    {
      names: out.blue_windows_names?.value ?? [],
      ips: out.blue_windows_ips?.value ?? [],
      floatingIps: out.blue_windows_floating_ips?.value ?? [],
      role: (i) => (i === 0 ? 'windows-dc' : 'windows-member'),
    },
    {
      names: out.blue_linux_names?.value ?? [],
      ips: out.blue_linux_ips?.value ?? [],
      floatingIps: out.blue_linux_floating_ips?.value ?? [],
      role: () => 'linux-member',
    },
  ]

  return {
    topology: groups.flatMap(groupRecords),
    assignment: new Map(Object.entries(out.service_hosts?.value ?? {})),
  }
}

function parseJson(raw: string, source: string): unknown {
  try {
    return JSON.parse(raw)
  } catch (err) {
    throw new FeedError(`${source} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`)
  }
}

/** Run `tofu output -json` in `dir` */
export function readTofuOutput(dir: string): ProvisioningFeed {
  let stdout: string
  try {
    stdout = execFileSync('tofu', ['output', '-json'], { cwd: dir, encoding: 'utf-8', stdio: ['ignore', 'pipe', 'pipe'] })
  } catch (err) {
    throw new FeedError(`'tofu output -json' failed in ${dir}: ${err instanceof Error ? err.message : String(err)}`)
  }
  return parseTofuOutput(parseJson(stdout, 'tofu output'))
}

/** Read a saved `tofu output -json` document */
export function readTofuJsonFile(path: string): ProvisioningFeed {
  let raw: string
  try {
    raw = readFileSync(path, 'utf-8')
  } catch (err) {
    throw new FeedError(`cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`)
  }
  return parseTofuOutput(parseJson(raw, path))
}
