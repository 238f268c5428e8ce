import { describe, it, expect, vi } from 'vitest'

import { SourceFetchError } from './errors'
import { fetchEmojiData, fetchJson, fetchKeywordMap } from './sources'

const EMOJI_URL = 'https://example.test/emoji.json'
const KEYWORDS_URL = 'https://example.test/emoji-en-US.json'

/**
 * fetch stand-in answering every request
 * with the same body.
 */
function respondWith(body: string, init: ResponseInit = { status: 200 }) {
  return vi.fn(async (_input: string | URL | Request) => new Response(body, init))
}

describe('fetchJson', () => {
  it('parses a JSON body', async () => {
    const fetch = respondWith('{"ok":true}')
    await expect(fetchJson(EMOJI_URL, { fetch })).resolves.toEqual({ ok: true })
    expect(fetch).toHaveBeenCalledWith(EMOJI_URL)
  })

  it('fails on a non-2xx status', async () => {
    const fetch = respondWith('missing', { status: 404, statusText: 'Not Found' })
    const result = fetchJson(EMOJI_URL, { fetch })
    await expect(result).rejects.toBeInstanceOf(SourceFetchError)
    await expect(result).rejects.toMatchObject({
      message: `failed to fetch ${EMOJI_URL}: 404 Not Found`,
      url: EMOJI_URL,
      status: 404,
    })
  })

  it('fails on a network error', async () => {
    const networkError = new TypeError('fetch failed')
    const fetch = vi.fn(async (_input: string | URL | Request): Promise<Response> => {
      throw networkError
    })
    const result = fetchJson(EMOJI_URL, { fetch })
    await expect(result).rejects.toMatchObject({
      name: 'SourceFetchError',
      message: `failed to fetch ${EMOJI_URL}`,
      cause: networkError,
    })
  })

  it('fails on a body that is not JSON', async () => {
    const fetch = respondWith('<html>rate limited</html>')
    await expect(fetchJson(EMOJI_URL, { fetch }))
      .rejects.toThrow(`invalid JSON from ${EMOJI_URL}`)
  })
})

describe('fetchEmojiData', () => {
  it('returns the records, extra fields included', async () => {
    const fetch = respondWith(JSON.stringify([{
      unified: '1F600',
      name: 'GRINNING FACE',
      short_names: ['grinning'],
      category: 'Smileys & Emotion',
      sort_order: 1,
      has_img_apple: true,
      subcategory: 'face-smiling',
    }]))
    const records = await fetchEmojiData(EMOJI_URL, { fetch })
    expect(records).toHaveLength(1)
    expect(records[0]).toMatchObject({
      unified: '1F600',
      short_names: ['grinning'],
      subcategory: 'face-smiling',
    })
  })

  it('accepts records with only a unified field', async () => {
    const fetch = respondWith('[{"unified":"1F600"}]')
    await expect(fetchEmojiData(EMOJI_URL, { fetch }))
      .resolves.toEqual([{ unified: '1F600' }])
  })

  it('rejects a document that is not a list', async () => {
    const fetch = respondWith('{"unified":"1F600"}')
    await expect(fetchEmojiData(EMOJI_URL, { fetch }))
      .rejects.toThrow(`unexpected document from ${EMOJI_URL}: Expected array, received object`)
  })

  it('names the first field that does not fit', async () => {
    const fetch = respondWith('[{"unified":"1F600"},{"name":"NO CODE"}]')
    await expect(fetchEmojiData(EMOJI_URL, { fetch }))
      .rejects.toThrow(`unexpected document from ${EMOJI_URL} at 1.unified: Required`)
  })
})

describe('fetchKeywordMap', () => {
  it('returns a glyph lookup', async () => {
    const fetch = respondWith(JSON.stringify({
      '😀': ['grinning_face', 'happy'],
      '🚀': ['rocket'],
    }))
    const map = await fetchKeywordMap(KEYWORDS_URL, { fetch })
    expect(map.size).toBe(2)
    expect(map.get('😀')).toEqual(['grinning_face', 'happy'])
    expect(map.get('🎉')).toBeUndefined()
  })

  it('rejects keywords that are not lists', async () => {
    const fetch = respondWith('{"😀":"happy"}')
    await expect(fetchKeywordMap(KEYWORDS_URL, { fetch }))
      .rejects.toThrow(`unexpected document from ${KEYWORDS_URL} at 😀: Expected array, received string`)
  })
})
