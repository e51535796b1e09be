import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import * as z from 'zod'

// ---------- Types ----------

/**
 * `exact`: the whole normalized message must equal a keyword.
 * `contains`: any word of the normalized message equals a keyword. Fuzzy:
 * "don't stop now" matches too.
 */
export type InterruptMatchMode = 'exact' | 'contains'

export interface InterruptMatcher {
  readonly mode: InterruptMatchMode
  readonly keywords: ReadonlySet<string>
  matches: (text: string) => boolean
}

// ---------- Keyword set ----------

const keywordFileSchema = z.object({ keywords: z.array(z.string().min(1)).min(1) })

function loadDefaultKeywords(): string[] {
  const path = fileURLToPath(new URL('./interrupt-keywords.json', import.meta.url))
  return keywordFileSchema.parse(JSON.parse(readFileSync(path, 'utf8'))).keywords
}

export const DEFAULT_INTERRUPT_KEYWORDS: readonly string[] = loadDefaultKeywords()

// ---------- Normalization ----------

const LEADING_SLASH = /^\/+/
const BOT_SUFFIX = /@\S+$/
const TRAILING_PUNCTUATION = /[\s.!?,;:~…。！？、，]+$/u
const WORD_SEPARATORS = /[\s.!?,;:~…。！？、，"'()]+/u

/** NFKC, lower case, no leading slash or `@bot` suffix, no trailing punctuation. */
export function normalizeCommandText(text: string): string {
  let value = text.normalize('NFKC').trim().toLowerCase()
  if (LEADING_SLASH.test(value)) {
    value = value.replace(LEADING_SLASH, '').replace(BOT_SUFFIX, '')
  }
  return value.replace(TRAILING_PUNCTUATION, '').replace(/\s+/g, ' ').trim()
}

// ---------- Matcher ----------

export function createInterruptMatcher(
  mode: InterruptMatchMode = 'exact',
  extraKeywords: readonly string[] = [],
): InterruptMatcher {
  const keywords = new Set(
    [...DEFAULT_INTERRUPT_KEYWORDS, ...extraKeywords]
      .map(normalizeCommandText)
      .filter((k) => k.length > 0),
  )

  const matches = (text: string): boolean => {
    const normalized = normalizeCommandText(text)
    if (normalized.length === 0) return false
    if (keywords.has(normalized)) return true
    if (mode === 'exact') return false
    return normalized.split(WORD_SEPARATORS).some((word) => word.length > 0 && keywords.has(word))
  }

  return { mode, keywords, matches }
}
