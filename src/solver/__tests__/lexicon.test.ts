import { describe, it, expect } from 'vitest'
import os from 'node:os'
import path from 'node:path'
import { createLexicon, loadLexicon } from '@/solver/data/loader'
import { LexiconError } from '@/solver/errors'

describe('createLexicon', () => {
  it('cleans both lists and makes every answer guessable', () => {
    const lex = createLexicon(['crane', ' plane ', '', 'CRANE', 'toolong'], ['slate', 'PLANE'])
    expect(lex.answers).toEqual(['CRANE', 'PLANE'])
    expect(lex.allowed).toEqual(['SLATE', 'PLANE', 'CRANE'])
    expect(lex.stats()).toEqual({ totalAnswers: 2, totalAllowed: 3, answersInAllowed: 1 })
    expect(lex.isAnswer('crane')).toBe(true)
    expect(lex.isAnswer('SLATE')).toBe(false)
    expect(lex.isAllowed('slate')).toBe(true)
  })

  it('is frozen', () => {
    const lex = createLexicon(['CRANE'], ['SLATE'])
    expect(Object.isFrozen(lex)).toBe(true)
    expect(Object.isFrozen(lex.answers)).toBe(true)
  })

  it('rejects empty lists and too few answers', () => {
    expect(() => createLexicon([], ['SLATE'])).toThrow(LexiconError)
    expect(() => createLexicon(['CRANE'], ['', '1234'])).toThrow(LexiconError)
    expect(() => createLexicon(['CRANE', 'PLANE'], ['SLATE'], { minAnswers: 3 })).toThrow(
      'Too few answers loaded: 2 < 3',
    )
  })
})

describe('loadLexicon', () => {
  it('reads the bundled English lists', async () => {
    const lex = await loadLexicon()
    const { totalAnswers, totalAllowed, answersInAllowed } = lex.stats()
    expect(totalAnswers).toBe(lex.answers.length)
    expect(answersInAllowed).toBe(totalAnswers)
    expect(totalAllowed).toBeGreaterThan(totalAnswers)
    expect(lex.isAllowed('SALET')).toBe(true)
    expect(lex.isAnswer('SALET')).toBe(false)
    for (const w of lex.answers) expect(lex.isAllowed(w)).toBe(true)
  })

  it('wraps read failures', async () => {
    const missing = path.join(os.tmpdir(), 'no-such-lexicon-dir')
    await expect(loadLexicon(missing)).rejects.toBeInstanceOf(LexiconError)
  })
})
