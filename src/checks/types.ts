/**
 * Rollcall — Check Types
 *
 * Check records are authored in YAML and handed to the scoring engine
 * unchanged. Nested list entries are opaque here; the engine validates
 * their shape when it loads its config.
 */

import type { OsClass } from '../topology/types.js'

export type NestedValue = string | number | boolean | NestedValue[] | { [key: string]: NestedValue }

export type NestedEntry = { [key: string]: NestedValue }

export type CheckDefinition = {
  type: string
  display?: string
  credlists?: string[]
  port?: number
  encrypted?: boolean
  anonymous?: boolean
  share?: string
  domain?: string
  records?: NestedEntry[]
  urls?: NestedEntry[]
  commands?: NestedEntry[]
  queries?: NestedEntry[]
  files?: NestedEntry[]
}

/** service → ordered default checks */
export type DefaultCheckTable = ReadonlyMap<string, readonly CheckDefinition[]>

export type OverrideEntry = {
  /** service → checks that replace the default list outright */
  serviceOverrides: ReadonlyMap<string, readonly CheckDefinition[]>
  /** Always appended after the service-derived checks */
  extraChecks: readonly CheckDefinition[]
}

/** host → override entry */
export type OverrideTable = ReadonlyMap<string, OverrideEntry>

export type ResolvedBox = {
  name: string
  address: string
  publicAddress?: string
  role: string
  osClass: OsClass
  checks: readonly CheckDefinition[]
}
