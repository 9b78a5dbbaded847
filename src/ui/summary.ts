/**
 * Rollcall — Run Summary
 *
 * Markdown report of a resolved lab: one table row per host, then totals,
 * then any diagnostics.
 */

import type { ResolvedLab } from '../pipeline.js'
import { assignedServices } from '../services/reverse.js'
import { describeDiagnostic, type Diagnostic } from '../validate/diagnostics.js'

function cell(text: string): string {
  return text.replace(/\|/g, '\\|')
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`
}

export function buildSummary(lab: ResolvedLab, diagnostics: readonly Diagnostic[] = []): string {
  const lines = ['# Lab summary', '']

  if (lab.boxes.length === 0) {
    lines.push('No hosts in the topology.')
  } else {
    lines.push('| Host | Class | Address | Services | Checks |', '|---|---|---|---|---|')
    for (const box of lab.boxes) {
      const services = lab.hostServices.get(box.name) ?? []
      lines.push(
        `| ${cell(box.name)} | ${box.osClass.toLowerCase()} | ${cell(box.address)} | ${services.length ? cell(services.join(', ')) : '-'} | ${box.checks.length} |`
      )
    }
    const checks = lab.boxes.reduce((sum, box) => sum + box.checks.length, 0)
    lines.push('', `**${plural(lab.boxes.length, 'host')}**, ${plural(checks, 'check')}.`)

    const inUse = assignedServices(lab.hostServices)
    if (inUse.length) lines.push('', `Services: ${inUse.join(', ')}`)
  }

  const errors = diagnostics.filter((d) => d.severity === 'error')
  const warnings = diagnostics.filter((d) => d.severity === 'warning')

  if (errors.length) {
    lines.push('', '## Errors', '', ...errors.map((d) => `- ${describeDiagnostic(d)}`))
  }
  if (warnings.length) {
    lines.push('', '## Warnings', '', ...warnings.map((d) => `- ${describeDiagnostic(d)}`))
  }

  return lines.join('\n') + '\n'
}
