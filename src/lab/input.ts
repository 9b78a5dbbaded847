/**
 * Rollcall — Pipeline Input
 *
 * Combines the provisioning feed (if any) with the authored lab. Lab
 * entries win over the feed for the same host or service.
 */

import type { ProvisioningFeed } from '../topology/tofu.js'
import type { TopologyRecord } from '../topology/types.js'
import type { PipelineInput } from '../pipeline.js'
import type { LabDefinition } from './loader.js'

export function buildPipelineInput(lab: LabDefinition, feed?: ProvisioningFeed): PipelineInput {
  const topology = new Map<string, TopologyRecord>()
  for (const record of feed?.topology ?? []) topology.set(record.name, record)
  for (const { sourceFile, ...record } of lab.topology.values()) topology.set(record.name, record)

  const assignment = new Map<string, readonly string[]>(feed?.assignment ?? [])
  for (const [service, hosts] of lab.services) assignment.set(service, hosts)

  return {
    topology: [...topology.values()],
    assignment,
    defaults: lab.checks,
    overrides: lab.overrides,
  }
}
