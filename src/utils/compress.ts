import * as zst from '@bokuweb/zstd-wasm'

import { ZSTD_LEVEL } from '../constants'

let ready: Promise<void> | null = null

// WASM must be initialized once before use
function ensureZstd() {
  if (!ready) {
    ready = typeof zst.init === 'function'
      ? zst.init()
      : Promise.resolve()
  }
  return ready
}

/**
 * Zstandard at a high level for static assets.
 */
export async function zstd(
  data: Buffer | Uint8Array,
  level = ZSTD_LEVEL,
) {
  await ensureZstd()
  const out = zst.compress(Buffer.from(data), level)
  return Buffer.from(out)
}

/**
 * Size in bytes the artifact would take
 * over the wire with zstd.
 */
export async function compressedSize(data: string | Uint8Array) {
  const buf = typeof data === 'string'
    ? Buffer.from(data, 'utf8')
    : data
  const out = await zstd(buf)
  return out.byteLength
}
