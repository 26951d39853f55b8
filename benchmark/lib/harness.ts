/**
 * Benchmark harness: vector suites measured with tinybench
 */

import { Bench } from 'tinybench'

export type SuiteCategory = 'builders' | 'ops'

/**
 * Benchmarks run once per vector length
 */
export interface VectorSuite {
  name: string
  category: SuiteCategory
  /**
   * Timed bodies for one length, keyed by task name. Inputs are built
   * here, outside the bodies.
   */
  tasks(len: number): Record<string, () => void>
}

export interface RunOptions {
  /** Time in ms per task */
  time: number
  warmup: boolean
  lengths: readonly number[]
  /** Substring a task name must contain */
  filter?: string
}

export interface TaskRow {
  suite: string
  task: string
  length: number
  opsPerSec: number
  /** Mean time per call in microseconds */
  meanUs: number
  /** Relative margin of error, percent */
  rme: number
}

export const VECTOR_LENGTHS: readonly number[] = [64, 1_024, 16_384, 262_144]

/**
 * Run every task of a suite at every requested length
 */
export async function runSuite(suite: VectorSuite, options: RunOptions): Promise<TaskRow[]> {
  const bench = new Bench({ time: options.time })
  const labels = new Map<string, { task: string; length: number }>()

  for (const length of options.lengths) {
    for (const [task, fn] of Object.entries(suite.tasks(length))) {
      if (options.filter !== undefined && !task.includes(options.filter)) continue
      const label = `${task} [${length}]`
      labels.set(label, { task, length })
      bench.add(label, fn)
    }
  }

  if (options.warmup) await bench.warmup()
  await bench.run()

  return bench.tasks.flatMap((t) => {
    const entry = labels.get(t.name)
    if (t.result === undefined || entry === undefined) return []
    // tinybench reports milliseconds
    return [{ suite: suite.name, ...entry, opsPerSec: t.result.hz, meanUs: t.result.mean * 1000, rme: t.result.rme }]
  })
}

function formatMean(us: number): string {
  if (us < 1) return `${(us * 1000).toFixed(0)} ns`
  if (us < 1000) return `${us.toFixed(1)} µs`
  return `${(us / 1000).toFixed(2)} ms`
}

/**
 * One aligned console line per task
 */
export function formatRow(row: TaskRow): string {
  const ops = Math.round(row.opsPerSec).toLocaleString('en-US')
  return `  ${row.task.padEnd(20)} ${String(row.length).padStart(8)}  ${ops.padStart(12)} ops/s  ${formatMean(row.meanUs).padStart(10)}  ±${row.rme.toFixed(1)}%`
}
