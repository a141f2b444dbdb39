import { describe, it, expect } from 'vitest'
import { countBatches, iterateBatches, makeBatch, unpadBatch } from '../lib/batch.js'
import { sentence } from './helpers.js'

const s1 = sentence([2, 3], [1, 2], [[2, 3], [4]])
const s2 = sentence([4], [3], [[5, 6, 7]])
const s3 = sentence([5, 6, 7], [2, 2, 2])

describe('iterateBatches', () => {
  it('pads each batch to its longest sentence with id 0', () => {
    const [first] = iterateBatches([s1, s2, s3], 2)
    expect(first?.words).toEqual([[2, 3], [4, 0]])
    expect(first?.tags).toEqual([[1, 2], [3, 0]])
    expect(first?.lengths).toEqual([2, 1])
    expect(first?.mask).toEqual([[true, true], [true, false]])
  })

  it('pads characters to the longest word in the batch', () => {
    const [first] = iterateBatches([s1, s2, s3], 2)
    expect(first?.chars).toEqual([
      [[2, 3, 0], [4, 0, 0]],
      [[5, 6, 7], [0, 0, 0]]
    ])
    expect(first?.charLengths).toEqual([[2, 1], [3, 0]])
  })

  it('keeps dataset order and leaves a short final batch', () => {
    const batches = [...iterateBatches([s1, s2, s3], 2)]
    expect(batches).toHaveLength(2)
    expect(batches[1]?.lengths).toEqual([3])
    expect(batches[1]?.words).toEqual([[5, 6, 7]])
    expect(countBatches(3, 2)).toBe(2)
  })

  it('recovers every sentence after unpadding', () => {
    const data = [s1, s2, s3]
    const recovered = [...iterateBatches(data, 2)].flatMap(b => unpadBatch(b))
    expect(recovered).toEqual(data)
  })

  it('yields the same batches on every pass', () => {
    const batches = iterateBatches([s1, s2, s3], 2)
    expect([...batches]).toEqual([...batches])
  })

  it('yields nothing for an empty dataset', () => {
    expect([...iterateBatches([], 4)]).toEqual([])
    expect(countBatches(0, 4)).toBe(0)
  })

  it('rejects a non-positive batch size', () => {
    expect(() => iterateBatches([s1], 0)).toThrow(RangeError)
    expect(() => iterateBatches([s1], 1.5)).toThrow(RangeError)
  })
})

describe('makeBatch', () => {
  it('keeps a single-sentence batch unpadded', () => {
    const batch = makeBatch([s3])
    expect(batch.words).toEqual([[5, 6, 7]])
    expect(batch.chars).toEqual([[[2], [2], [2]]])
    expect(batch.mask).toEqual([[true, true, true]])
  })
})
