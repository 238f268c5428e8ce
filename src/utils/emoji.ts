// https://github.com/iamcal/emoji-data
import { MAX_CODE_POINT, SKIN_TONE_MAX, SKIN_TONE_MIN } from '../constants'
import { CodepointError } from './errors'
import type { EmojiDataRecord } from './schemas'
import type { Eligibility } from './types'

const HEX_SEGMENT = /^[0-9a-f]+$/i

function unifiedSegments(unified: string) {
    return unified.split('-')
}

/**
 * Convert emoji-data's `unified` hex string
 * to the glyph it encodes.
 *
 *   "1F600"       -> "😀"
 *   "1F1FA-1F1F8" -> "🇺🇸"
 *
 * Throws a CodepointError when a segment is
 * not hex or falls outside Unicode.
 */
export function decodeUnified(unified: string): string {
    return unifiedSegments(unified)
      .map(segment => {
        if (!HEX_SEGMENT.test(segment)) {
          throw new CodepointError(segment, unified)
        }
        const codePoint = Number.parseInt(segment, 16)
        if (codePoint > MAX_CODE_POINT) {
          throw new CodepointError(segment, unified)
        }
        return String.fromCodePoint(codePoint)
      })
      .join('')
}

/**
 * True when any segment is a Fitzpatrick
 * skin tone modifier. Compares code point
 * values, so "01F3FB" counts too.
 */
export function hasSkinToneModifier(unified: string): boolean {
    return unifiedSegments(unified).some(segment => {
      if (!HEX_SEGMENT.test(segment)) return false
      const codePoint = Number.parseInt(segment, 16)
      return codePoint >= SKIN_TONE_MIN && codePoint <= SKIN_TONE_MAX
    })
}

/**
 * Decide whether a record ships, and why not.
 * `seen` holds glyphs already emitted in this
 * build; it is read, never written.
 */
export function checkEligibility(
    record: EmojiDataRecord,
    seen: ReadonlySet<string>,
): Eligibility {
    // Apple is the render target
    if (record.has_img_apple !== true) {
      return { eligible: false, reason: 'missing-apple-image' }
    }

    if (hasSkinToneModifier(record.unified)) {
      return { eligible: false, reason: 'skin-tone-variant' }
    }

    let glyph: string
    try {
      glyph = decodeUnified(record.unified)
    } catch (e) {
      if (e instanceof CodepointError) {
        return { eligible: false, reason: 'invalid-codepoint' }
      }
      throw e
    }

    if (seen.has(glyph)) {
      return { eligible: false, reason: 'duplicate' }
    }

    return { eligible: true, glyph }
}

export function isEligible(
    record: EmojiDataRecord,
    seen: ReadonlySet<string>,
): boolean {
    return checkEligibility(record, seen).eligible
}
