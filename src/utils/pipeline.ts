import { DEFAULT_CATEGORY, DEFAULT_SORT_ORDER } from '../constants'
import { checkEligibility } from './emoji'
import { mergeKeywords } from './keywords'
import type { EmojiDataRecord } from './schemas'
import type {
  BuildResult,
  EmojiEntry,
  KeywordMap,
  SkipCounts,
} from './types'

interface BuildState {
  seen: Set<string>
  entries: EmojiEntry[]
  skipped: SkipCounts
}

function emptySkipCounts(): SkipCounts {
  return {
    'missing-apple-image': 0,
    'skin-tone-variant': 0,
    'invalid-codepoint': 0,
    'duplicate': 0,
  }
}

/**
 * Shape one eligible record into the
 * artifact's entry format.
 */
export function toEmojiEntry(
  record: EmojiDataRecord,
  glyph: string,
  keywordMap: KeywordMap,
): EmojiEntry {
  const keywords = mergeKeywords(
    record.short_names ?? [],
    glyph,
    keywordMap,
  )
  const name = record.name?.toLowerCase()
    || keywords[0]
    || glyph

  return Object.freeze({
    emoji: glyph,
    name,
    keywords: Object.freeze(keywords),
    category: record.category ?? DEFAULT_CATEGORY,
    sortOrder: record.sort_order ?? DEFAULT_SORT_ORDER,
  })
}

function step(
  state: BuildState,
  record: EmojiDataRecord,
  keywordMap: KeywordMap,
): BuildState {
  const result = checkEligibility(record, state.seen)
  if (!result.eligible) {
    state.skipped[result.reason]++
    return state
  }
  state.seen.add(result.glyph)
  state.entries.push(
    toEmojiEntry(record, result.glyph, keywordMap)
  )
  return state
}

/**
 * Merge emoji-data records with emojilib
 * keywords.
 *
 * Records are emitted in input order. emoji-data
 * ships sorted by sort_order and nothing here
 * re-sorts, so callers that need a ranked list
 * must hand in a ranked list.
 */
export function buildEmojiIndex(
  records: readonly EmojiDataRecord[],
  keywordMap: KeywordMap,
): BuildResult {
  const { entries, skipped } = records.reduce<BuildState>(
    (state, record) => step(state, record, keywordMap),
    { seen: new Set(), entries: [], skipped: emptySkipCounts() },
  )
  return { entries, skipped }
}

export function buildEmojiList(
  records: readonly EmojiDataRecord[],
  keywordMap: KeywordMap,
): readonly EmojiEntry[] {
  return buildEmojiIndex(records, keywordMap).entries
}

/**
 * Indexes where sort_order goes down compared
 * to the previous ranked record. Unranked
 * records are ignored.
 */
export function findOrderViolations(
  records: readonly EmojiDataRecord[],
): number[] {
  const violations: number[] = []
  let previous: number | undefined
  for (const [i, record] of records.entries()) {
    const order = record.sort_order
    if (order === undefined) continue
    if (previous !== undefined && order < previous) {
      violations.push(i)
    }
    previous = order
  }
  return violations
}
