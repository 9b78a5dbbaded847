/**
 * Rollcall — Lab File Schema
 *
 * Shape of one authored lab YAML file. Every section is optional so a lab
 * can be split across files however its authors like.
 */

import { z } from 'zod'
import type { CheckDefinition, NestedEntry, NestedValue } from '../checks/types.js'

const nestedValue: z.ZodType<NestedValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.array(nestedValue), z.record(z.string(), nestedValue)])
)

const nestedEntry: z.ZodType<NestedEntry> = z.record(z.string(), nestedValue)

// `name` and `ip` are keys of the box table itself
const RESERVED_CHECK_TYPES = ['name', 'ip']

export const checkSchema: z.ZodType<CheckDefinition> = z
  .object({
    type: z
      .string()
      .min(1)
      .refine((type) => !RESERVED_CHECK_TYPES.includes(type), {
        message: "'name' and 'ip' are reserved box keys, not check types",
      }),
    display: z.string().optional(),
    credlists: z.array(z.string()).optional(),
    port: z.number().int().min(1).max(65535).optional(),
    encrypted: z.boolean().optional(),
    anonymous: z.boolean().optional(),
    share: z.string().optional(),
    domain: z.string().optional(),
    records: z.array(nestedEntry).optional(),
    urls: z.array(nestedEntry).optional(),
    commands: z.array(nestedEntry).optional(),
    queries: z.array(nestedEntry).optional(),
    files: z.array(nestedEntry).optional(),
  })
  .strict()

const topologyEntry = z
  .object({
    name: z.string().min(1),
    address: z.string().min(1),
    role: z.string().min(1),
    public_address: z.string().min(1).optional(),
  })
  .strict()

const overrideEntry = z
  .object({
    service_overrides: z.record(z.string(), z.array(checkSchema)).optional(),
    extra_checks: z.array(checkSchema).optional(),
  })
  .strict()

export const labFileSchema = z
  .object({
    topology: z.array(topologyEntry).optional(),
    // `ssh:` with no value parses as null and means the same as `ssh: []`
    services: z.record(z.string(), z.array(z.string()).nullable()).optional(),
    checks: z.record(z.string(), z.array(checkSchema)).optional(),
    overrides: z.record(z.string(), overrideEntry.nullable()).optional(),
  })
  .strict()

export type LabFile = z.infer<typeof labFileSchema>
