/**
 * Rollcall — Scoring Engine Config Renderer
 *
 * Emits the TOML the scoring engine reads at startup: optional top-level
 * settings, then one [[box]] per host with one [[box.<type>]] table per
 * check. Only fields that are present are written. Nested lists become
 * repeated sub-tables, in authored order.
 */

import type { CheckDefinition, NestedEntry, NestedValue, ResolvedBox } from '../checks/types.js'
import type { Scalar } from '../config/types.js'

type ScalarField = 'display' | 'credlists' | 'port' | 'encrypted' | 'anonymous' | 'share' | 'domain'
type ListField = 'records' | 'urls' | 'commands' | 'queries' | 'files'

const SCALAR_FIELDS: readonly ScalarField[] = ['display', 'credlists', 'port', 'encrypted', 'anonymous', 'share', 'domain']

/** Nested list field → sub-table name used by the engine */
const LIST_FIELDS: readonly [ListField, string][] = [
  ['records', 'record'],
  ['urls', 'url'],
  ['commands', 'command'],
  ['queries', 'query'],
  ['files', 'file'],
]

const CHECK_INDENT = '  '
const NESTED_INDENT = '    '

// ── Values ──────────────────────────────────────────────────────────────────

const BARE_KEY = /^[A-Za-z0-9_-]+$/

export function tomlKey(key: string): string {
  return BARE_KEY.test(key) ? key : tomlString(key)
}

export function tomlString(value: string): string {
  let out = '"'
  for (const ch of value) {
    switch (ch) {
      case '"': out += '\\"'; break
      case '\\': out += '\\\\'; break
      case '\b': out += '\\b'; break
      case '\t': out += '\\t'; break
      case '\n': out += '\\n'; break
      case '\f': out += '\\f'; break
      case '\r': out += '\\r'; break
      default: {
        const code = ch.codePointAt(0) ?? 0
        out += code < 0x20 || code === 0x7f ? `\\u${code.toString(16).padStart(4, '0')}` : ch
      }
    }
  }
  return out + '"'
}

function tomlNumber(value: number): string {
  if (Number.isNaN(value)) return 'nan'
  if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf'
  return String(value)
}

export function tomlValue(value: NestedValue): string {
  if (typeof value === 'string') return tomlString(value)
  if (typeof value === 'number') return tomlNumber(value)
  if (typeof value === 'boolean') return value ? 'true' : 'false'
  if (Array.isArray(value)) return `[${value.map(tomlValue).join(', ')}]`

  const pairs = Object.entries(value).map(([k, v]) => `${tomlKey(k)} = ${tomlValue(v)}`)
  return pairs.length ? `{ ${pairs.join(', ')} }` : '{}'
}

// ── Tables ──────────────────────────────────────────────────────────────────

function renderNested(path: string, entry: NestedEntry): string[] {
  const lines = [`${NESTED_INDENT}[[${path}]]`]
  for (const [key, value] of Object.entries(entry)) {
    lines.push(`${NESTED_INDENT}${tomlKey(key)} = ${tomlValue(value)}`)
  }
  return lines
}

/** One block for the check table, then one block per nested entry */
export function renderCheck(check: CheckDefinition): string[][] {
  const table = `box.${tomlKey(check.type)}`
  const head = [`${CHECK_INDENT}[[${table}]]`]

  for (const field of SCALAR_FIELDS) {
    const value = check[field]
    if (value !== undefined) head.push(`${CHECK_INDENT}${field} = ${tomlValue(value)}`)
  }

  const blocks = [head]
  for (const [field, singular] of LIST_FIELDS) {
    for (const entry of check[field] ?? []) {
      blocks.push(renderNested(`${table}.${singular}`, entry))
    }
  }
  return blocks
}

export function renderBox(box: ResolvedBox): string[][] {
  const blocks = [['[[box]]', `name = ${tomlString(box.name)}`, `ip = ${tomlString(box.address)}`]]
  for (const check of box.checks) blocks.push(...renderCheck(check))
  return blocks
}

export function renderCheckConfig(
  boxes: readonly ResolvedBox[],
  engine: Readonly<Record<string, Scalar>> = {}
): string {
  const blocks: string[][] = []

  const settings = Object.keys(engine).sort()
  if (settings.length) {
    blocks.push(settings.map((key) => `${tomlKey(key)} = ${tomlValue(engine[key] ?? '')}`))
  }

  for (const box of boxes) blocks.push(...renderBox(box))

  if (blocks.length === 0) return ''
  return blocks.map((lines) => lines.join('\n')).join('\n\n') + '\n'
}
