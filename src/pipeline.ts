/**
 * Rollcall — Pipeline
 *
 * topology → registry → expanded assignment → host services → boxes →
 * validation → rendered artifacts. Each stage takes the previous stage's
 * value and returns a new one; nothing is shared between runs.
 *
 * Artifacts are rendered only when no error-level diagnostic exists.
 */

import { buildRegistry } from './topology/classifier.js'
import type { HostRegistry, TopologyRecord } from './topology/types.js'
import { resolveAssignments, type ExpandedAssignment, type ServiceAssignment } from './services/resolver.js'
import { buildHostServices, type HostServices } from './services/reverse.js'
import { resolveBoxes } from './checks/engine.js'
import type { DefaultCheckTable, OverrideTable, ResolvedBox } from './checks/types.js'
import { validateResolution } from './validate/validator.js'
import { partitionDiagnostics, type Diagnostic } from './validate/diagnostics.js'
import { renderInventory, type GroupVars } from './render/inventory.js'
import { renderCheckConfig } from './render/checks-toml.js'
import { renderRdpFiles } from './render/rdp.js'
import type { RdpConfig, Scalar } from './config/types.js'

export type PipelineInput = {
  topology: readonly TopologyRecord[]
  assignment: ServiceAssignment
  defaults: DefaultCheckTable
  overrides: OverrideTable
}

export type RenderOptions = {
  groupVars?: GroupVars
  engine?: Readonly<Record<string, Scalar>>
  /** Render RDP files when set */
  rdp?: RdpConfig
}

export type ResolvedLab = {
  registry: HostRegistry
  expanded: ExpandedAssignment
  hostServices: HostServices
  boxes: ResolvedBox[]
}

export type Artifacts = {
  inventory: string
  checks: string
  /** file name → content */
  rdp: Map<string, string>
}

export type PipelineResult =
  | { ok: true; lab: ResolvedLab; artifacts: Artifacts; warnings: Diagnostic[] }
  | { ok: false; lab: ResolvedLab; errors: Diagnostic[]; warnings: Diagnostic[] }

/** Stages 1–5. Throws TopologyError when the topology cannot be classified. */
export function resolveLab(input: PipelineInput): { lab: ResolvedLab; diagnostics: Diagnostic[] } {
  const registry = buildRegistry(input.topology)
  const { expanded, diagnostics: assignmentDiagnostics } = resolveAssignments(input.assignment, registry)
  const hostServices = buildHostServices(expanded, registry)
  const boxes = resolveBoxes(hostServices, registry, input.defaults, input.overrides)

  const diagnostics: Diagnostic[] = [
    ...assignmentDiagnostics,
    ...validateResolution({ boxes, overrides: input.overrides, registry, expanded }),
  ]

  return { lab: { registry, expanded, hostServices, boxes }, diagnostics }
}

export function renderArtifacts(lab: ResolvedLab, options: RenderOptions = {}): Artifacts {
  return {
    inventory: renderInventory(lab.hostServices, lab.boxes, options.groupVars),
    checks: renderCheckConfig(lab.boxes, options.engine),
    rdp: options.rdp ? renderRdpFiles(lab.hostServices, lab.boxes, options.rdp) : new Map(),
  }
}

export function runPipeline(input: PipelineInput, options: RenderOptions = {}): PipelineResult {
  const { lab, diagnostics } = resolveLab(input)
  const { errors, warnings } = partitionDiagnostics(diagnostics)

  if (errors.length > 0) {
    return { ok: false, lab, errors, warnings }
  }
  return { ok: true, lab, artifacts: renderArtifacts(lab, options), warnings }
}
