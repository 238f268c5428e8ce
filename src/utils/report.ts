import { hasTTY } from 'std-env'

import { SAMPLE_KEYWORDS, SAMPLE_SIZE } from '../constants'
import type { EmojiEntry, SkipCounts } from './types'

export interface BuildSummary {
  total: number
  categories: { category: string; count: number }[]
  samples: {
    emoji: string
    name: string
    sortOrder: number
    keywords: string[]
  }[]
  skipped: SkipCounts
  bytes: number
  compressedBytes: number
}

/**
 * Count entries per category, sorted by
 * category name.
 */
export function countByCategory(entries: readonly EmojiEntry[]) {
  const counts = new Map<string, number>()
  for (const e of entries) {
    counts.set(e.category, (counts.get(e.category) ?? 0) + 1)
  }
  return Array.from(counts, ([category, count]) => ({ category, count }))
    .sort((a, b) => (a.category < b.category ? -1 : a.category > b.category ? 1 : 0))
}

export function summarize(
  entries: readonly EmojiEntry[],
  stats: {
    bytes: number
    compressedBytes: number
    skipped: SkipCounts
  },
): BuildSummary {
  return {
    total: entries.length,
    categories: countByCategory(entries),
    samples: entries.slice(0, SAMPLE_SIZE).map(e => ({
      emoji: e.emoji,
      name: e.name,
      sortOrder: e.sortOrder,
      keywords: e.keywords.slice(0, SAMPLE_KEYWORDS),
    })),
    skipped: stats.skipped,
    bytes: stats.bytes,
    compressedBytes: stats.compressedBytes,
  }
}

/**
 * Format a byte count, e.g. "1,234 bytes (1.2 KB)".
 */
export function formatBytes(n: number) {
  return `${n.toLocaleString('en-US')} bytes (${(n / 1024).toFixed(1)} KB)`
}

export function printSummary(
  summary: BuildSummary,
  options: { table?: boolean } = {},
) {
  const { table = hasTTY } = options

  console.log(`🚣 Processed ${summary.total} emojis (after filtering)`)

  const skippedTotal = Object.values(summary.skipped)
    .reduce((a, b) => a + b, 0)
  if (skippedTotal > 0) {
    console.log(`🚣 Skipped ${skippedTotal}:`,
      Object.entries(summary.skipped)
        .filter(([, n]) => n > 0)
        .map(([reason, n]) => `${reason}=${n}`)
        .join(', ')
    )
  }

  console.log('🚣 By category:')
  if (table) {
    console.table(summary.categories)
  } else {
    for (const { category, count } of summary.categories) {
      console.log(`  ${category}: ${count}`)
    }
  }

  console.log(`🚣 Size: ${formatBytes(summary.bytes)}`)
  console.log(`🚣 Zstd: ${formatBytes(summary.compressedBytes)}`)

  console.log('🚣 Sample entries:')
  for (const s of summary.samples) {
    console.log(`  ${s.emoji} ${s.name} (order: ${s.sortOrder})`)
    console.log(`     keywords: ${s.keywords.join(', ')}`)
  }
}
