/**
 * Tour of the vector API: builders, arithmetic, reductions and slicing
 *
 * Run with: npx tsx examples/vector-basics.ts
 */

import numvec, { DType, Logger, NumvecError, Vector, config, linspace, range, sub } from '@numvec/core'

Logger.setLevel('info')
config({ seed: 7 })

const x = linspace(5, 1.0, 10.0)
console.log('linspace:', x.toString())

const counts = range(0, 6, 1, DType.int32)
console.log('squares:', counts.power(2).toString(), 'max', counts.power(2).max())

const fives = numvec.full(4, 5)
console.log('6 - v:', sub(6, fives).toString())

const noise = numvec.uniform(4, -1, 1)
console.log('noise:', noise.toString(), 'sum', noise.sum())

const grid = numvec.twoDim(DType.uint8).withShape([2, 3]).fullOf(9).generate()
console.log('grid:', JSON.stringify(grid))

try {
  Vector.from([3, 1, 4, 1, 5]).add(Vector.from([3, 1, 4, 1]))
} catch (error) {
  if (error instanceof NumvecError) {
    console.log(`${error.code}: ${error.message}`)
  } else {
    throw error
  }
}
