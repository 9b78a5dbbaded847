/**
 * Rollcall — Diagnostics
 *
 * Authoring problems collected across a whole run. Errors block every
 * artifact; warnings are reported and the run continues.
 */

export type Severity = 'error' | 'warning'

export type UnknownHostReference = {
  kind: 'UnknownHostReference'
  severity: 'error'
  service: string
  host: string
  /** Registry host that differs only in letter case */
  suggestion?: string
}

export type UnknownOverrideHost = {
  kind: 'UnknownOverrideHost'
  severity: 'error'
  host: string
}

export type OrphanedServiceOverride = {
  kind: 'OrphanedServiceOverride'
  severity: 'warning'
  host: string
  service: string
}

export type DuplicateCheckIdentity = {
  kind: 'DuplicateCheckIdentity'
  severity: 'error'
  host: string
  type: string
  display: string
}

export type Diagnostic =
  | UnknownHostReference
  | UnknownOverrideHost
  | OrphanedServiceOverride
  | DuplicateCheckIdentity

export function unknownHostReference(service: string, host: string, suggestion?: string): UnknownHostReference {
  return suggestion === undefined
    ? { kind: 'UnknownHostReference', severity: 'error', service, host }
    : { kind: 'UnknownHostReference', severity: 'error', service, host, suggestion }
}

export function unknownOverrideHost(host: string): UnknownOverrideHost {
  return { kind: 'UnknownOverrideHost', severity: 'error', host }
}

export function orphanedServiceOverride(host: string, service: string): OrphanedServiceOverride {
  return { kind: 'OrphanedServiceOverride', severity: 'warning', host, service }
}

export function duplicateCheckIdentity(host: string, type: string, display: string): DuplicateCheckIdentity {
  return { kind: 'DuplicateCheckIdentity', severity: 'error', host, type, display }
}

/** Human-readable one-liner for a diagnostic */
export function describeDiagnostic(d: Diagnostic): string {
  switch (d.kind) {
    case 'UnknownHostReference': {
      const hint = d.suggestion ? ` (did you mean '${d.suggestion}'?)` : ''
      return `service '${d.service}' is assigned to unknown host '${d.host}'${hint}`
    }
    case 'UnknownOverrideHost':
      return `overrides reference unknown host '${d.host}'`
    case 'OrphanedServiceOverride':
      return `host '${d.host}' overrides service '${d.service}', which is not assigned to any host`
    case 'DuplicateCheckIdentity': {
      const label = d.display ? `${d.type}/${d.display}` : d.type
      return `host '${d.host}' has more than one '${label}' check`
    }
  }
}

export function partitionDiagnostics(diagnostics: readonly Diagnostic[]): {
  errors: Diagnostic[]
  warnings: Diagnostic[]
} {
  return {
    errors: diagnostics.filter((d) => d.severity === 'error'),
    warnings: diagnostics.filter((d) => d.severity === 'warning'),
  }
}
