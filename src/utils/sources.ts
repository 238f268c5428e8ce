import type { z } from 'zod'

import { EMOJI_DATA_URL, EMOJILIB_URL } from '../constants'
import { SourceFetchError } from './errors'
import { keywordMapFrom } from './keywords'
import {
  EmojiDataSchema,
  KeywordDocumentSchema,
  type EmojiDataRecord,
} from './schemas'
import type { KeywordMap } from './types'

export interface FetchOptions {
  /** Swap the global fetch, e.g. in tests. */
  fetch?: typeof globalThis.fetch
}

/**
 * GET a URL and parse the body as JSON.
 * No retries: any failure is a SourceFetchError.
 */
export async function fetchJson(
  url: string,
  options: FetchOptions = {},
): Promise<unknown> {
  const { fetch = globalThis.fetch } = options

  let resp: Response
  try {
    resp = await fetch(url)
  } catch (e) {
    throw new SourceFetchError(`failed to fetch ${url}`, { url, cause: e })
  }
  if (!resp.ok) {
    throw new SourceFetchError(
      `failed to fetch ${url}: ${resp.status} ${resp.statusText}`.trim(),
      { url, status: resp.status },
    )
  }

  const text = await resp.text()
  try {
    return JSON.parse(text)
  } catch (e) {
    throw new SourceFetchError(`invalid JSON from ${url}`, { url, cause: e })
  }
}

function parseDocument<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  url: string,
): z.infer<T> {
  const parsed = schema.safeParse(data)
  if (!parsed.success) {
    const [issue] = parsed.error.issues
    const where = issue && issue.path.length > 0
      ? ` at ${issue.path.join('.')}`
      : ''
    throw new SourceFetchError(
      `unexpected document from ${url}${where}: ${issue?.message ?? 'invalid'}`,
      { url, cause: parsed.error },
    )
  }
  return parsed.data
}

/**
 * Load emoji-data's base emoji list.
 */
export async function fetchEmojiData(
  url: string = EMOJI_DATA_URL,
  options: FetchOptions = {},
): Promise<EmojiDataRecord[]> {
  const data = await fetchJson(url, options)
  return parseDocument(EmojiDataSchema, data, url)
}

/**
 * Load emojilib's glyph -> keywords map.
 */
export async function fetchKeywordMap(
  url: string = EMOJILIB_URL,
  options: FetchOptions = {},
): Promise<KeywordMap> {
  const data = await fetchJson(url, options)
  return keywordMapFrom(parseDocument(KeywordDocumentSchema, data, url))
}
