/**
 * Reduction Benchmarks
 *
 * sum, max, power, filter and slice.
 */

import { DType, uniform } from '@numvec/core'
import type { VectorSuite } from '../lib/harness.js'

export const suite: VectorSuite = {
  name: 'Reductions and Selection',
  category: 'ops',

  tasks(len) {
    const floats = uniform(len, -1, 1)
    const ints = uniform(len, -1000, 1000, DType.int32)

    return {
      sum: () => {
        floats.sum()
      },
      'max int32': () => {
        ints.max()
      },
      'power(3)': () => {
        floats.power(3)
      },
      filter: () => {
        floats.filter((x) => x > 0)
      },
      'slice half': () => {
        floats.slice({ end: Math.floor(len / 2) })
      },
    }
  },
}
