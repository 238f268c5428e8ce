/**
 * Build the emoji picker dataset.
 *
 * Merges emoji-data (names, categories,
 * Apple availability, sort order) with
 * emojilib (search keywords).
 *
 * Run:
 *   $ npm run build:data
 *
 * Outputs:
 *   src/artifacts/emojis.json
 */

import { EMOJI_JSON } from '@/constants'
import { runBuild } from '@/utils/build'
import { printSummary } from '@/utils/report'

async function main() {
  const summary = await runBuild()

  console.log('🚣 Output:', EMOJI_JSON)
  printSummary(summary)
  console.log('✅ Done!')
}

main().catch((e) => {
  console.error(e)
  process.exit(1)
})
