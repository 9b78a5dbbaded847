/**
 * Rollcall — Config Loader
 *
 * Loads ~/.rollcall/config.yaml (or an explicit path), merges it over the
 * defaults and validates the result. A missing file means defaults; a
 * malformed one is an error.
 */

import { readFileSync, existsSync } from 'node:fs'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import { DEFAULT_CONFIG } from './defaults.js'
import type { RollcallConfig } from './types.js'
import { defaultConfigPath } from './paths.js'
import { ConfigError, formatIssues } from '../errors.js'

export const CONFIG_PATH = defaultConfigPath()

const scalar = z.union([z.string(), z.number(), z.boolean()])

const configSchema: z.ZodType<RollcallConfig> = z.object({
  lab_dir: z.string().min(1),
  output: z.object({
    dir: z.string().min(1),
    inventory: z.string().min(1),
    checks: z.string().min(1),
    rdp_dir: z.string().min(1),
  }),
  inventory: z.object({
    group_vars: z.record(z.string(), z.record(z.string(), scalar)),
  }),
  engine: z.record(z.string(), scalar),
  rdp: z.object({
    gateway: z.string().optional(),
    username: z.string().optional(),
  }),
  log: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
  }),
})

type PlainObject = Record<string, unknown>

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Deep merge b into a (b wins) */
export function deepMerge(a: PlainObject, b: PlainObject): PlainObject {
  const result: PlainObject = { ...a }
  for (const [key, val] of Object.entries(b)) {
    const base = a[key]
    if (isPlainObject(val) && isPlainObject(base)) {
      result[key] = deepMerge(base, val)
    } else if (val !== undefined && val !== null) {
      result[key] = val
    }
  }
  return result
}

/** Load config from `path`, merged with defaults and environment overrides */
export function loadConfig(path: string = CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): RollcallConfig {
  let fromFile: PlainObject = {}

  if (existsSync(path)) {
    let raw: string
    try {
      raw = readFileSync(path, 'utf-8')
    } catch (err) {
      throw new ConfigError(path, `cannot read file: ${err instanceof Error ? err.message : String(err)}`)
    }
    let parsed: unknown
    try {
      parsed = parseYaml(raw)
    } catch (err) {
      throw new ConfigError(path, err instanceof Error ? err.message : String(err))
    }
    if (parsed !== null && parsed !== undefined) {
      if (!isPlainObject(parsed)) throw new ConfigError(path, 'expected a mapping at the top level')
      fromFile = parsed
    }
  }

  let merged = deepMerge(DEFAULT_CONFIG, fromFile)
  if (env.ROLLCALL_LOG_LEVEL) {
    merged = deepMerge(merged, { log: { level: env.ROLLCALL_LOG_LEVEL } })
  }

  const result = configSchema.safeParse(merged)
  if (!result.success) {
    throw new ConfigError(path, formatIssues(result.error.issues))
  }
  return result.data
}
