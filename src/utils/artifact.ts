import fs from 'node:fs/promises'
import { dirname } from 'node:path'

import { ArtifactError } from './errors'
import { EmojiArtifactSchema } from './schemas'
import type { EmojiEntry } from './types'

/**
 * Minified JSON, emoji kept as-is
 * (JSON.stringify never escapes them).
 * Fields are picked explicitly so nothing
 * extra leaks into the artifact.
 */
export function serializeEntries(entries: readonly EmojiEntry[]): string {
  return JSON.stringify(
    entries.map(e => ({
      emoji: e.emoji,
      name: e.name,
      keywords: e.keywords,
      category: e.category,
      sortOrder: e.sortOrder,
    }))
  )
}

/**
 * Write the artifact, creating parent dirs.
 * Returns the size in bytes.
 */
export async function writeArtifact(
  path: string,
  entries: readonly EmojiEntry[],
): Promise<number> {
  const body = Buffer.from(serializeEntries(entries), 'utf8')
  await fs.mkdir(dirname(path), { recursive: true })
  await fs.writeFile(path, body)
  return body.byteLength
}

/**
 * Read an artifact back and check its shape.
 */
export async function readArtifact(path: string): Promise<EmojiEntry[]> {
  const text = await fs.readFile(path, 'utf8')
  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (e) {
    throw new ArtifactError(`${path} is not valid JSON`, { cause: e })
  }
  const parsed = EmojiArtifactSchema.safeParse(data)
  if (!parsed.success) {
    throw new ArtifactError(`${path} does not match the emoji schema`, {
      cause: parsed.error,
    })
  }
  return parsed.data
}

/**
 * Confirm the file on disk holds exactly
 * the entries we serialized.
 */
export async function verifyArtifact(
  path: string,
  entries: readonly EmojiEntry[],
): Promise<void> {
  const written = await readArtifact(path)
  if (serializeEntries(written) !== serializeEntries(entries)) {
    throw new ArtifactError(`${path} round-trip mismatch`)
  }
}

/**
 * Write and verify beside `path`, then move
 * into place. A file that fails verification
 * is removed and never replaces the artifact.
 */
export async function publishArtifact(
  path: string,
  entries: readonly EmojiEntry[],
): Promise<number> {
  const staging = `${path}.tmp`
  try {
    const bytes = await writeArtifact(staging, entries)
    await verifyArtifact(staging, entries)
    await fs.rename(staging, path)
    return bytes
  } catch (e) {
    await fs.rm(staging, { force: true })
    throw e
  }
}
