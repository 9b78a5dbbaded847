/**
 * Rollcall — Markdown Renderer
 *
 * Renders markdown text to ANSI-styled terminal output
 * using marked + marked-terminal.
 */

import chalk from 'chalk'
import { Marked } from 'marked'
import { markedTerminal } from 'marked-terminal'

const marked = new Marked(
  markedTerminal({
    firstHeading: chalk.magenta.bold,
    heading: chalk.cyan.bold,
    strong: chalk.bold,
    em: chalk.italic,
    codespan: chalk.yellow,
    showSectionPrefix: false,
    reflowText: true,
    width: (process.stdout.columns || 80) - 4,
    tab: 2,
  })
)

/**
 * Render markdown text to ANSI-styled terminal string.
 * Returns the original text if parsing fails.
 */
export function renderMarkdown(text: string): string {
  try {
    const rendered = marked.parse(text)
    if (typeof rendered !== 'string') return text
    // marked-terminal may add trailing newlines; trim to one
    return rendered.replace(/\n{3,}/g, '\n\n').trimEnd()
  } catch {
    return text
  }
}
