/**
 * Rollcall — Logger
 *
 * JSON lines on stderr; stdout is left to the human-facing output.
 */

import { pino, type Logger } from 'pino'
import type { LogLevel } from '../config/types.js'

export type { Logger }

export function createLogger(level: LogLevel = 'info'): Logger {
  return pino(
    {
      level,
      base: {
        system: 'rollcall',
      },
    },
    pino.destination(2)
  )
}

/** Child logger tagged with the component that emits through it */
export function componentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component })
}
