/**
 * Element-wise Operation Benchmarks
 *
 * Vector-vector, broadcast, in-place and chained arithmetic.
 */

import { DType, ones, range, sub } from '@numvec/core'
import type { VectorSuite } from '../lib/harness.js'

export const suite: VectorSuite = {
  name: 'Element-wise Operations',
  category: 'ops',

  tasks(len) {
    const a = ones(len)
    const b = ones(len).addScalar(1)
    const ints = range(0, len, 1, DType.int32)

    return {
      add: () => {
        a.add(b)
      },
      mul: () => {
        a.mul(b)
      },
      'mul int32': () => {
        ints.mul(ints)
      },
      'scalar - vector': () => {
        sub(6, a)
      },
      addInplace: () => {
        a.clone().addInplace(b)
      },
      'chain of 4': () => {
        a.add(b).mulScalar(2).sub(a).addScalar(1)
      },
    }
  },
}
