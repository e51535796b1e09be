import { describe, expect, test } from 'vitest'
import {
  createInterruptMatcher,
  DEFAULT_INTERRUPT_KEYWORDS,
  normalizeCommandText,
} from '@/router/interrupt'

describe('normalizeCommandText', () => {
  test('lowercases, trims and drops trailing punctuation', () => {
    expect(normalizeCommandText('  STOP!!  ')).toBe('stop')
    expect(normalizeCommandText('Cancel.')).toBe('cancel')
  })

  test('strips a leading slash and a bot mention', () => {
    expect(normalizeCommandText('/stop@helper_bot')).toBe('stop')
    expect(normalizeCommandText('//abort')).toBe('abort')
  })

  test('keeps a mention that is not part of a command', () => {
    expect(normalizeCommandText('ping @alice')).toBe('ping @alice')
  })

  test('folds full-width characters', () => {
    expect(normalizeCommandText('ＳＴＯＰ')).toBe('stop')
  })

  test('collapses inner whitespace', () => {
    expect(normalizeCommandText('hold   on')).toBe('hold on')
  })
})

describe('createInterruptMatcher', () => {
  test('loads the default keyword list', () => {
    expect(DEFAULT_INTERRUPT_KEYWORDS).toContain('stop')
    expect(DEFAULT_INTERRUPT_KEYWORDS).toContain('멈춰')
  })

  test('exact mode matches whole messages only', () => {
    const matcher = createInterruptMatcher('exact')
    expect(matcher.matches('stop')).toBe(true)
    expect(matcher.matches('/stop')).toBe(true)
    expect(matcher.matches('Stop!')).toBe(true)
    expect(matcher.matches('멈춰!')).toBe(true)
    expect(matcher.matches('please stop')).toBe(false)
    expect(matcher.matches('stopwatch')).toBe(false)
    expect(matcher.matches('')).toBe(false)
    expect(matcher.matches('?!')).toBe(false)
  })

  test('contains mode matches any keyword word', () => {
    const matcher = createInterruptMatcher('contains')
    expect(matcher.matches('please stop')).toBe(true)
    expect(matcher.matches("don't stop now")).toBe(true)
    expect(matcher.matches('stopwatch')).toBe(false)
    expect(matcher.matches('keep going')).toBe(false)
  })

  test('extra keywords are normalized and added', () => {
    const matcher = createInterruptMatcher('exact', ['Hold On'])
    expect(matcher.keywords.has('hold on')).toBe(true)
    expect(matcher.matches('hold on!')).toBe(true)
    expect(matcher.matches('stop')).toBe(true)
  })
})
