import {
  EMOJI_DATA_URL,
  EMOJI_JSON,
  EMOJILIB_URL,
} from '../constants'
import { publishArtifact, serializeEntries } from './artifact'
import { compressedSize } from './compress'
import { buildEmojiIndex, findOrderViolations } from './pipeline'
import { summarize, type BuildSummary } from './report'
import { fetchEmojiData, fetchKeywordMap, type FetchOptions } from './sources'

export interface BuildOptions extends FetchOptions {
  emojiDataUrl?: string
  emojilibUrl?: string
  outPath?: string
}

/**
 * Fetch both sources, merge, write and verify
 * the artifact. Nothing is written unless both
 * fetches succeed.
 */
export async function runBuild(options: BuildOptions = {}): Promise<BuildSummary> {
  const {
    emojiDataUrl = EMOJI_DATA_URL,
    emojilibUrl = EMOJILIB_URL,
    outPath = EMOJI_JSON,
  } = options

  console.log('🚣 Downloading sources...')
  const [records, keywordMap] = await Promise.all([
    fetchEmojiData(emojiDataUrl, options),
    fetchKeywordMap(emojilibUrl, options),
  ])
  console.log(`🚣 ${records.length} entries from emoji-data`)
  console.log(`🚣 ${keywordMap.size} entries from emojilib`)

  const outOfOrder = findOrderViolations(records)
  if (outOfOrder.length > 0) {
    console.warn(
      `⚠️ emoji-data is not sorted by sort_order (${outOfOrder.length} records out of place); output keeps source order`
    )
  }

  console.log('🚣 Building emoji rows...')
  const { entries, skipped } = buildEmojiIndex(records, keywordMap)

  console.log('🚣 Writing', outPath)
  const bytes = await publishArtifact(outPath, entries)

  const compressedBytes = await compressedSize(serializeEntries(entries))

  return summarize(entries, { bytes, compressedBytes, skipped })
}
