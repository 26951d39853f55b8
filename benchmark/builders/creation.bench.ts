/**
 * Builder Benchmarks
 *
 * Fill, sequence and random builders.
 */

import { DType, full, linspace, normal, range, uniform, zeros } from '@numvec/core'
import type { VectorSuite } from '../lib/harness.js'

export const suite: VectorSuite = {
  name: 'Vector Builders',
  category: 'builders',

  tasks: (len) => ({
    zeros: () => {
      zeros(len)
    },
    'full int64': () => {
      full(len, 7n, DType.int64)
    },
    'range int32': () => {
      range(0, len, 1, DType.int32)
    },
    'linspace float32': () => {
      linspace(len, 0, 1, DType.float32)
    },
    uniform: () => {
      uniform(len, -1, 1)
    },
    normal: () => {
      normal(len, 0, 1)
    },
  }),
}
