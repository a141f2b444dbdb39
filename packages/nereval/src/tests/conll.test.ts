import { describe, it, expect } from 'vitest'
import { Alphabet } from '../lib/alphabet.js'
import { encodeSentence, encodeSentences, normalizeWord, parseConll } from '../lib/conll.js'
import { CorpusFormatError, FrozenStateError } from '../lib/errors.js'
import { toyAlphabets } from './helpers.js'

describe('parseConll', () => {
  it('takes the first column as word and the last as tag', () => {
    const text = 'EU NNP B-NP B-ORG\nrejects VBZ B-VP O\n\n\nJohn\tNNP\tB-NP\tB-PER\n'
    expect(parseConll(text)).toEqual([
      { words: ['EU', 'rejects'], tags: ['B-ORG', 'O'] },
      { words: ['John'], tags: ['B-PER'] }
    ])
  })

  it('keeps a final sentence without a trailing blank line', () => {
    expect(parseConll('a O\r\nb O')).toEqual([{ words: ['a', 'b'], tags: ['O', 'O'] }])
  })

  it('reports the line of a row without a tag column', () => {
    expect(() => parseConll('EU B-ORG\n\nlonely\n', 'test.txt')).toThrow(CorpusFormatError)
    expect(() => parseConll('EU B-ORG\n\nlonely\n', 'test.txt')).toThrow(/test\.txt:3:/)
  })
})

describe('encodeSentence', () => {
  it('replaces digits with 0', () => {
    expect(normalizeWord('1996-08-22')).toBe('0000-00-00')
    expect(normalizeWord('B52', false)).toBe('B52')
  })

  it('maps words, characters and tags through the alphabets', () => {
    const alphabets = toyAlphabets()
    const s = encodeSentence({ words: ['EU', 'Mary'], tags: ['B-ORG', 'B-PER'] }, alphabets)
    expect(s.words).toEqual([2, 0])
    expect(s.tags).toEqual([1, 3])
    expect(s.length).toBe(2)
    expect(s.chars[0]).toEqual([alphabets.char.getIndex('E'), alphabets.char.getIndex('U')])
    // only 'r' is in the character alphabet
    expect(s.chars[1]).toEqual([0, 0, alphabets.char.getIndex('r'), 0])
  })

  it('truncates long words to the character cap', () => {
    const s = encodeSentence({ words: ['EUEUEU'], tags: ['O'] }, toyAlphabets(), { maxCharLength: 4 })
    expect(s.chars[0]).toHaveLength(4)
  })

  it('refuses to encode through an open alphabet', () => {
    const alphabets = { ...toyAlphabets(), tag: new Alphabet('ner', ['_PAD_NER']) }
    expect(() => encodeSentences([{ words: ['EU'], tags: ['O'] }], alphabets)).toThrow(FrozenStateError)
  })
})
