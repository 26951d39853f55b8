/**
 * Benchmark CLI entry point
 *
 * Usage:
 *   npm run bench                          # Run all benchmarks
 *   npm run bench -- --category ops
 *   npm run bench -- --filter linspace
 *   npm run bench -- --lengths 64,4096 --json
 */

import { suite as builders } from './builders/creation.bench.js'
import { VECTOR_LENGTHS, formatRow, runSuite, type RunOptions, type TaskRow, type VectorSuite } from './lib/harness.js'
import { suite as elementWise } from './ops/element-wise.bench.js'
import { suite as reductions } from './ops/reductions.bench.js'

const SUITES: readonly VectorSuite[] = [builders, elementWise, reductions]

interface CliOptions extends RunOptions {
  category?: string
  json: boolean
}

function parseLengths(value: string): number[] {
  const lengths = value.split(',').map((part) => Number(part.trim()))
  if (lengths.some((len) => !Number.isInteger(len) || len < 1)) {
    throw new Error(`--lengths expects positive integers, got "${value}"`)
  }
  return lengths
}

/**
 * Parse command line arguments
 */
function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { time: 1000, warmup: true, lengths: VECTOR_LENGTHS, json: false }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    const next = args[i + 1]

    if (arg === '--category' && next) {
      options.category = next
      i++
    } else if (arg === '--filter' && next) {
      options.filter = next
      i++
    } else if (arg === '--lengths' && next) {
      options.lengths = parseLengths(next)
      i++
    } else if (arg === '--time' && next) {
      options.time = parseInt(next, 10)
      i++
    } else if (arg === '--no-warmup') {
      options.warmup = false
    } else if (arg === '--json') {
      options.json = true
    } else if (arg === '--help' || arg === '-h') {
      printHelp()
      process.exit(0)
    }
  }

  return options
}

function printHelp(): void {
  console.log(`
numvec benchmarks

Options:
  --category <name>    builders or ops
  --filter <text>      Only tasks whose name contains <text>
  --lengths <a,b,...>  Vector lengths (default: ${VECTOR_LENGTHS.join(',')})
  --time <ms>          Time per task in ms (default: 1000)
  --no-warmup          Skip warmup
  --json               Print the result rows as JSON
`)
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2))
  const selected = SUITES.filter((s) => options.category === undefined || s.category === options.category)
  const rows: TaskRow[] = []

  for (const suite of selected) {
    if (!options.json) console.log(`\n${suite.category} / ${suite.name}`)
    const suiteRows = await runSuite(suite, options)
    if (!options.json) suiteRows.forEach((row) => console.log(formatRow(row)))
    rows.push(...suiteRows)
  }

  if (options.json) {
    console.log(JSON.stringify({ node: process.version, rows }, null, 2))
  }
}

main().catch((err: unknown) => {
  console.error('Benchmark failed:', err)
  process.exit(1)
})
