#!/usr/bin/env node

/**
 * Rollcall — Entry Point
 */

import { main } from './cli.js'

process.exitCode = main(process.argv.slice(2))
