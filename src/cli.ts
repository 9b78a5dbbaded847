/**
 * Rollcall — Command Line
 *
 * Loads config → lab (+ provisioning feed) → runs the pipeline → writes
 * the artifacts. Nothing is written unless the whole lab validates.
 */

import { join } from 'node:path'
import { loadConfig, CONFIG_PATH } from './config/loader.js'
import type { RollcallConfig } from './config/types.js'
import { loadLabDirectory } from './lab/loader.js'
import { buildPipelineInput } from './lab/input.js'
import { readTofuJsonFile, readTofuOutput, type ProvisioningFeed } from './topology/tofu.js'
import { runPipeline, type Artifacts } from './pipeline.js'
import { describeDiagnostic } from './validate/diagnostics.js'
import { writeArtifacts, removeStaleFiles, type ArtifactFile } from './output/writer.js'
import { createLogger, componentLogger } from './log/logger.js'
import { buildSummary } from './ui/summary.js'
import { renderMarkdown } from './ui/markdown.js'
import { RollcallError, ValidationFailedError } from './errors.js'

export type CliOptions = {
  configPath: string
  labDir?: string
  outDir?: string
  tofuDir?: string
  tofuJson?: string
  check: boolean
  summary: boolean
  rdp: boolean
}

export type ParsedArgs =
  | { kind: 'run'; options: CliOptions }
  | { kind: 'help' }
  | { kind: 'error'; message: string }

export const USAGE = `Usage: rollcall [options]

Resolve service checks for every lab host and write the Ansible inventory
and the scoring engine config.

Options:
  --config <file>     Config file (default: ${CONFIG_PATH})
  --lab <dir>         Lab definition directory (overrides lab_dir)
  --out <dir>         Output directory (overrides output.dir)
  --tofu-dir <dir>    Read hosts and service_hosts from 'tofu output -json' in <dir>
  --tofu-json <file>  Read hosts and service_hosts from a saved 'tofu output -json'
  --check             Validate only; write nothing
  --summary           Print a summary of the resolved lab
  --rdp               Also write .rdp files for hosts running rdp
  -h, --help          Show this help`

export const EXIT_OK = 0
export const EXIT_INVALID = 1
export const EXIT_CONFIG = 2
export const EXIT_USAGE = 3

const VALUE_FLAGS = {
  '--config': 'configPath',
  '--lab': 'labDir',
  '--out': 'outDir',
  '--tofu-dir': 'tofuDir',
  '--tofu-json': 'tofuJson',
} as const

const SWITCHES = {
  '--check': 'check',
  '--summary': 'summary',
  '--rdp': 'rdp',
} as const

function isValueFlag(arg: string): arg is keyof typeof VALUE_FLAGS {
  return Object.hasOwn(VALUE_FLAGS, arg)
}

function isSwitch(arg: string): arg is keyof typeof SWITCHES {
  return Object.hasOwn(SWITCHES, arg)
}

// ── Args ────────────────────────────────────────────────────────────────────

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const options: CliOptions = { configPath: CONFIG_PATH, check: false, summary: false, rdp: false }

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]

    if (arg === '-h' || arg === '--help') return { kind: 'help' }

    if (isSwitch(arg)) {
      options[SWITCHES[arg]] = true
      continue
    }

    if (isValueFlag(arg)) {
      const value = argv[i + 1]
      if (value === undefined || value.startsWith('--')) {
        return { kind: 'error', message: `${arg} needs a value` }
      }
      options[VALUE_FLAGS[arg]] = value
      i++
      continue
    }

    return { kind: 'error', message: `Unknown argument: ${arg}` }
  }

  if (options.tofuDir && options.tofuJson) {
    return { kind: 'error', message: '--tofu-dir and --tofu-json cannot be used together' }
  }

  return { kind: 'run', options }
}

// ── Run ─────────────────────────────────────────────────────────────────────

function loadFeed(options: CliOptions): ProvisioningFeed | undefined {
  if (options.tofuDir) return readTofuOutput(options.tofuDir)
  if (options.tofuJson) return readTofuJsonFile(options.tofuJson)
  return undefined
}

/** Where each artifact goes, relative to the output directory */
export function artifactFiles(artifacts: Artifacts, outDir: string, config: RollcallConfig): ArtifactFile[] {
  const files: ArtifactFile[] = [
    { path: join(outDir, config.output.inventory), content: artifacts.inventory },
    { path: join(outDir, config.output.checks), content: artifacts.checks },
  ]
  for (const [name, content] of artifacts.rdp) {
    files.push({ path: join(outDir, config.output.rdp_dir, name), content })
  }
  return files
}

/** Run once; throws RollcallError subclasses on failure */
export function run(options: CliOptions): void {
  const config = loadConfig(options.configPath)
  const logger = createLogger(config.log.level)
  const log = componentLogger(logger, 'pipeline')

  const labDir = options.labDir ?? config.lab_dir
  const feed = loadFeed(options)
  const lab = loadLabDirectory(labDir)
  const input = buildPipelineInput(lab, feed)

  log.info({ labDir, files: lab.files.length, hosts: input.topology.length, feed: feed !== undefined }, 'resolving lab')

  const result = runPipeline(input, {
    groupVars: config.inventory.group_vars,
    engine: config.engine,
    rdp: options.rdp ? config.rdp : undefined,
  })

  for (const warning of result.warnings) {
    log.warn({ diagnostic: warning }, describeDiagnostic(warning))
  }

  if (options.summary) {
    const diagnostics = result.ok ? result.warnings : [...result.errors, ...result.warnings]
    console.log(renderMarkdown(buildSummary(result.lab, diagnostics)))
  }

  if (!result.ok) {
    for (const error of result.errors) {
      log.error({ diagnostic: error }, describeDiagnostic(error))
    }
    throw new ValidationFailedError(result.errors)
  }

  if (options.check) {
    console.log(`Lab OK: ${result.lab.boxes.length} hosts, ${result.warnings.length} warnings`)
    return
  }

  const outDir = options.outDir ?? config.output.dir
  const files = artifactFiles(result.artifacts, outDir, config)
  writeArtifacts(files)

  const out = componentLogger(logger, 'output')
  for (const file of files) {
    out.info({ path: file.path, bytes: Buffer.byteLength(file.content) }, 'wrote artifact')
  }

  // .rdp files of hosts that no longer run rdp
  if (options.rdp) {
    const rdpDir = join(outDir, config.output.rdp_dir)
    for (const path of removeStaleFiles(rdpDir, '.rdp', new Set(result.artifacts.rdp.keys()))) {
      out.info({ path }, 'removed stale artifact')
    }
  }
}

export function exitCodeFor(err: RollcallError): number {
  switch (err.code) {
    case 'ConfigError':
    case 'LabFileError':
    case 'FeedError':
      return EXIT_CONFIG
    case 'UnknownRoleTag':
    case 'DuplicateHost':
    case 'ValidationFailed':
      return EXIT_INVALID
  }
}

export function main(argv: readonly string[]): number {
  const parsed = parseArgs(argv)

  if (parsed.kind === 'help') {
    console.log(USAGE)
    return EXIT_OK
  }
  if (parsed.kind === 'error') {
    console.error(parsed.message)
    console.error(USAGE)
    return EXIT_USAGE
  }

  try {
    run(parsed.options)
    return EXIT_OK
  } catch (err) {
    if (err instanceof RollcallError) {
      console.error(`rollcall: ${err.message}`)
      return exitCodeFor(err)
    }
    throw err
  }
}
