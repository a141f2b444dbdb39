import { describe, it, expect } from 'vitest'
import { ShapeMismatchError } from '../lib/errors.js'
import { mulberry32 } from '../lib/random.js'
import type { Matrix } from '../lib/types.js'
import { padPredictions, pathScore, viterbiDecode } from '../lib/viterbi/decoder.js'

function allPaths(length: number, first: number, numTags: number): number[][] {
  if (length === 0) return [[]]
  const out: number[][] = []
  for (const prefix of allPaths(length - 1, first, numTags)) {
    for (let y = first; y < numTags; y++) out.push([...prefix, y])
  }
  return out
}

describe('viterbiDecode', () => {
  it('follows a transition that rewards staying on the same tag', () => {
    const emit = [[2, 0], [2, 0], [2, 0]]
    const [pred] = viterbiDecode([emit], [[1, 0], [0, 0]], [3], { leadingSymbolic: 0 })
    expect(pred?.tags).toEqual([0, 0, 0])
    expect(pred?.score).toBe(8)
  })

  it('never predicts a leading symbolic tag', () => {
    const emit = [[10, 1, 0], [10, 0, 1]]
    const zeros = [[0, 0, 0], [0, 0, 0], [0, 0, 0]]
    const [pred] = viterbiDecode([emit], zeros, [2], { leadingSymbolic: 1 })
    expect(pred?.tags).toEqual([1, 2])
    expect(pred?.score).toBe(2)
  })

  it('prefers the best path over the best tag per position', () => {
    const emit = [[1, 0.9], [0.5, 0]]
    const transitions = [[-1, 0], [0, 0.6]]
    const [pred] = viterbiDecode([emit], transitions, [2], { leadingSymbolic: 0 })
    expect(pred?.tags).toEqual([1, 1])
    expect(pred?.score).toBeCloseTo(1.5)
  })

  it('breaks ties toward the lowest tag id', () => {
    const emit = [[0, 0, 0], [0, 0, 0], [0, 0, 0]]
    const zeros = [[0, 0, 0], [0, 0, 0], [0, 0, 0]]
    const [pred] = viterbiDecode([emit], zeros, [3], { leadingSymbolic: 1 })
    expect(pred?.tags).toEqual([1, 1, 1])
    expect(pred?.score).toBe(0)
  })

  it('decodes each sentence only up to its length', () => {
    const transitions = [[0, 0, 0], [0, 0, 0], [0, 0, 0]]
    const emissions = [
      [[0, 1, 0], [0, 0, 1], [0, 1, 0]],
      [[0, 0, 3], [0, 9, 0], [0, 9, 0]]
    ]
    const preds = viterbiDecode(emissions, transitions, [3, 1], { leadingSymbolic: 1 })
    expect(preds.map(p => p.tags)).toEqual([[1, 2, 1], [2]])
    expect(preds.map(p => p.score)).toEqual([3, 3])
    expect(padPredictions(preds, 3)).toEqual([[1, 2, 1], [2, 0, 0]])
    expect(padPredictions(preds, 3, 2)).toEqual([[1, 2, 1], [2, 2, 2]])
  })

  it('returns an empty path for a zero-length sentence', () => {
    const preds = viterbiDecode([[[1, 2]]], [[0, 0], [0, 0]], [0], { leadingSymbolic: 0 })
    expect(preds).toEqual([{ tags: [], score: 0 }])
  })

  it('leaves its inputs untouched and repeats its output', () => {
    const emissions = [[[0.1, 0.4, 0.2], [0.3, 0.1, 0.5]]]
    const transitions = [[0, 0.2, 0.1], [0.3, 0, 0.4], [0.2, 0.1, 0]]
    const before = JSON.stringify([emissions, transitions])
    const a = viterbiDecode(emissions, transitions, [2], { leadingSymbolic: 1 })
    const b = viterbiDecode(emissions, transitions, [2], { leadingSymbolic: 1 })
    expect(a).toEqual(b)
    expect(JSON.stringify([emissions, transitions])).toBe(before)
  })

  it('matches exhaustive search on random trellises', () => {
    const random = mulberry32(2024)
    const numTags = 4
    const first = 1
    for (let trial = 0; trial < 20; trial++) {
      const length = 1 + (trial % 4)
      const emit: Matrix = Array.from({ length }, () => Array.from({ length: numTags }, () => random() * 4 - 2))
      const transitions: Matrix = Array.from({ length: numTags }, () => Array.from({ length: numTags }, () => random() * 4 - 2))

      const best = Math.max(...allPaths(length, first, numTags).map(p => pathScore(emit, transitions, p)))
      const [pred] = viterbiDecode([emit], transitions, [length], { leadingSymbolic: first })

      expect(pred?.score).toBeCloseTo(best, 9)
      expect(pathScore(emit, transitions, pred?.tags ?? [])).toBeCloseTo(best, 9)
      expect(pred?.tags.every(y => y >= first)).toBe(true)
    }
  })

  describe('shape checks', () => {
    const emit = [[0, 0], [0, 0]]
    const square = [[0, 0], [0, 0]]

    it('rejects a non-square transition matrix', () => {
      expect(() => viterbiDecode([emit], [[0, 0], [0]], [2], { leadingSymbolic: 0 })).toThrow(ShapeMismatchError)
    })

    it('rejects a symbolic prefix that covers every tag', () => {
      expect(() => viterbiDecode([emit], square, [2], { leadingSymbolic: 2 })).toThrow(ShapeMismatchError)
    })

    it('rejects a lengths array of the wrong size', () => {
      expect(() => viterbiDecode([emit], square, [2, 2], { leadingSymbolic: 0 })).toThrow(ShapeMismatchError)
    })

    it('rejects a length beyond the padded width', () => {
      expect(() => viterbiDecode([emit], square, [3], { leadingSymbolic: 0 })).toThrow(ShapeMismatchError)
    })

    it('rejects emission rows of the wrong width', () => {
      expect(() => viterbiDecode([[[0, 0, 0], [0, 0, 0]]], square, [2], { leadingSymbolic: 0 })).toThrow(ShapeMismatchError)
    })
  })
})

describe('pathScore', () => {
  it('sums emissions and transitions along the path', () => {
    expect(pathScore([[1, 2], [3, 4]], [[10, 20], [30, 40]], [1, 0])).toBe(2 + 30 + 3)
  })
})
