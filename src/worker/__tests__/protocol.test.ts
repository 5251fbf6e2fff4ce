import { describe, it, expect } from 'vitest'
import { evaluateUnit, handleMessage, packCandidates, unpackCandidates, type Msg } from '@/worker/protocol'

describe('worker protocol', () => {
  it('packs candidates into one string', () => {
    const packed = packCandidates(['CRANE', 'CRATE'])
    expect(packed).toBe('CRANECRATE')
    expect(unpackCandidates(packed)).toEqual(['CRANE', 'CRATE'])
    expect(unpackCandidates('')).toEqual([])
  })

  it('scores words with pool indices and reports per-word failures', () => {
    const r = evaluateUnit({ offset: 10, words: ['tonzy', 'BAD', 'BUMPY'], candidates: ['CRANE', 'CRATE', 'CRAZE'] })
    expect(r.scores.map((s) => [s.index, s.word])).toEqual([
      [10, 'TONZY'],
      [12, 'BUMPY'],
    ])
    expect(r.scores[0]?.bits).toBeCloseTo(Math.log2(3), 12)
    expect(r.scores[1]?.bits).toBe(0)
    expect(r.failures).toEqual([{ index: 11, word: 'BAD', message: 'Expected a 5-letter word, got "BAD"' }])
  })

  it('answers an evaluate message with a result of the same id', () => {
    const msg: Msg = { id: 7, type: 'evaluate', payload: { offset: 0, words: ['CRANE'], candidates: 'CRANECRATECRAZE' } }
    const out = handleMessage(msg)
    expect(out.id).toBe(7)
    expect(out.type).toBe('result')
    if (out.type === 'result') {
      expect(out.result.scores).toHaveLength(1)
      expect(out.result.scores[0]?.bits).toBeCloseTo(Math.log2(3) - 2 / 3, 12)
    }
  })
})
