/**
 * Rollcall — Topology Types
 */

/** One row of the provisioning feed */
export type TopologyRecord = {
  name: string
  address: string
  role: string
  /** Externally reachable address (floating IP), when the VM has one */
  publicAddress?: string
}

export type OsClass = 'LINUX' | 'WINDOWS'

export type Host = TopologyRecord & {
  osClass: OsClass
}

/** Classified hosts keyed by name, in feed order */
export type HostRegistry = ReadonlyMap<string, Host>
