import type { KeywordDocument } from './schemas'
import type { KeywordMap } from './types'

/**
 * Lowercase, underscores to spaces,
 * single spaces, trimmed.
 *
 *   "Thumbs_Up" -> "thumbs up"
 */
export function normalizeKeyword(value: string): string {
    return value
      .toLowerCase()
      .replace(/_/g, ' ')
      .replace(/\s+/g, ' ')
      .trim()
}

/**
 * Text emoticons like ":D" or ";)".
 */
export function isEmoticon(value: string): boolean {
    const w = value.trim()
    return w.startsWith(':') || w.startsWith(';')
}

export function keywordMapFrom(document: KeywordDocument): KeywordMap {
    return new Map(Object.entries(document))
}

/**
 * Build the search keywords for one glyph.
 *
 * Short names come first, then emojilib's
 * keywords minus the first one (it repeats
 * the name). Both are normalized and each
 * term is kept once, at its first position.
 */
export function mergeKeywords(
    shortNames: readonly string[],
    glyph: string,
    keywordMap: KeywordMap,
): string[] {
    const seen = new Set<string>()
    const out: string[] = []

    const add = (raw: string) => {
      const w = normalizeKeyword(raw)
      if (w && !seen.has(w)) {
        seen.add(w)
        out.push(w)
      }
    }

    for (const shortName of shortNames) add(shortName)

    const libKeywords = keywordMap.get(glyph) ?? []
    for (const kw of libKeywords.slice(1)) {
      if (isEmoticon(kw)) continue
      add(kw)
    }

    return out
}
