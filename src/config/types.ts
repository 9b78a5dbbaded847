/**
 * Rollcall — Config Types
 */

export type Scalar = string | number | boolean

export type OutputConfig = {
  dir: string
  inventory: string
  checks: string
  rdp_dir: string
}

export type InventoryConfig = {
  /** group → connection variables, emitted as [group:vars] */
  group_vars: Record<string, Record<string, Scalar>>
}

export type RdpConfig = {
  gateway?: string
  username?: string
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent'

export type RollcallConfig = {
  lab_dir: string
  output: OutputConfig
  inventory: InventoryConfig
  /** Top-level scoring engine settings */
  engine: Record<string, Scalar>
  rdp: RdpConfig
  log: { level: LogLevel }
}
