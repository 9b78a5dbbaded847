/**
 * Rollcall — Errors
 *
 * Thrown errors are reserved for conditions that stop a run before the
 * pipeline can collect anything: bad config, unreadable lab files, a
 * topology that cannot be classified. Authoring mistakes found during
 * resolution are collected as diagnostics instead (see validate/diagnostics.ts).
 */

import type { Diagnostic } from './validate/diagnostics.js'

export type RollcallErrorCode =
  | 'ConfigError'
  | 'LabFileError'
  | 'FeedError'
  | 'UnknownRoleTag'
  | 'DuplicateHost'
  | 'ValidationFailed'

export class RollcallError extends Error {
  constructor(
    readonly code: RollcallErrorCode,
    message: string
  ) {
    super(message)
    this.name = new.target.name
  }
}

/** Tool config file could not be read or does not match the schema */
export class ConfigError extends RollcallError {
  constructor(
    readonly file: string,
    detail: string
  ) {
    super('ConfigError', `Invalid config ${file}: ${detail}`)
  }
}

/** A lab definition file is not valid YAML or violates the lab schema */
export class LabFileError extends RollcallError {
  constructor(
    readonly file: string,
    detail: string
  ) {
    super('LabFileError', `Invalid lab file ${file}: ${detail}`)
  }
}

/** The provisioning output could not be fetched or parsed */
export class FeedError extends RollcallError {
  constructor(detail: string) {
    super('FeedError', `Provisioning feed: ${detail}`)
  }
}

export class TopologyError extends RollcallError {
  constructor(
    code: 'UnknownRoleTag' | 'DuplicateHost',
    readonly host: string,
    message: string
  ) {
    super(code, message)
  }
}

/** Raised by callers that want fatal diagnostics as an exception */
export class ValidationFailedError extends RollcallError {
  constructor(readonly diagnostics: readonly Diagnostic[]) {
    const count = diagnostics.length
    super('ValidationFailed', `${count} error${count === 1 ? '' : 's'} in lab definition`)
  }
}

/** Turn a zod issue list into one line per issue, `path: message` */
export function formatIssues(issues: readonly { path: (string | number)[]; message: string }[]): string {
  return issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}
