/**
 * Rollcall — Lab Loader
 *
 * Multi-file YAML loader for the authored lab definition.
 * Reads every *.yaml / *.yml file in the lab directory, alphabetically;
 * for the same service, check table entry or override host, the later
 * file wins. A host defined in two files is an error.
 */

import { readFileSync, readdirSync, existsSync } from 'node:fs'
import { join } from 'node:path'
import { parse as parseYaml } from 'yaml'
import type { CheckDefinition, OverrideEntry } from '../checks/types.js'
import type { TopologyRecord } from '../topology/types.js'
import { LabFileError, TopologyError, formatIssues } from '../errors.js'
import { labFileSchema, type LabFile } from './schema.js'

/** A topology row with the file it was loaded from */
export type TopologyEntry = TopologyRecord & {
  sourceFile: string
}

/** The merged lab after loading all files */
export type LabDefinition = {
  topology: Map<string, TopologyEntry>
  services: Map<string, string[]>
  checks: Map<string, CheckDefinition[]>
  overrides: Map<string, OverrideEntry>
  files: string[]
}

export function emptyLab(): LabDefinition {
  return { topology: new Map(), services: new Map(), checks: new Map(), overrides: new Map(), files: [] }
}

// ── Parsing ─────────────────────────────────────────────────────────────────

export function parseLabFile(raw: string, filePath: string): LabFile {
  let doc: unknown
  try {
    doc = parseYaml(raw)
  } catch (err) {
    throw new LabFileError(filePath, err instanceof Error ? err.message : String(err))
  }

  // An empty file parses as null
  if (doc === null || doc === undefined) return {}

  const result = labFileSchema.safeParse(doc)
  if (!result.success) {
    throw new LabFileError(filePath, formatIssues(result.error.issues))
  }
  return result.data
}

// ── Merge ───────────────────────────────────────────────────────────────────

/** Fold one parsed file into the lab */
export function mergeLabFile(lab: LabDefinition, file: LabFile, filePath: string): void {
  for (const row of file.topology ?? []) {
    const existing = lab.topology.get(row.name)
    if (existing) {
      throw new TopologyError(
        'DuplicateHost',
        row.name,
        `Host '${row.name}' is defined in both ${existing.sourceFile} and ${filePath}`
      )
    }
    const entry: TopologyEntry = { name: row.name, address: row.address, role: row.role, sourceFile: filePath }
    if (row.public_address !== undefined) entry.publicAddress = row.public_address
    lab.topology.set(row.name, entry)
  }

  for (const [service, hosts] of Object.entries(file.services ?? {})) {
    lab.services.set(service, hosts ?? [])
  }

  for (const [service, checks] of Object.entries(file.checks ?? {})) {
    lab.checks.set(service, checks)
  }

  for (const [host, entry] of Object.entries(file.overrides ?? {})) {
    lab.overrides.set(host, {
      serviceOverrides: new Map(Object.entries(entry?.service_overrides ?? {})),
      extraChecks: entry?.extra_checks ?? [],
    })
  }

  lab.files.push(filePath)
}

// ── Loader ──────────────────────────────────────────────────────────────────

/** Load all lab files from `dir`. A missing directory yields an empty lab. */
export function loadLabDirectory(dir: string): LabDefinition {
  const lab = emptyLab()

  if (!existsSync(dir)) return lab

  const files = readdirSync(dir)
    .filter((f) => f.endsWith('.yaml') || f.endsWith('.yml'))
    .sort()

  for (const file of files) {
    const filePath = join(dir, file)
    let raw: string
    try {
      raw = readFileSync(filePath, 'utf-8')
    } catch (err) {
      throw new LabFileError(filePath, err instanceof Error ? err.message : String(err))
    }
    mergeLabFile(lab, parseLabFile(raw, filePath), filePath)
  }

  return lab
}
