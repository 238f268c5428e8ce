/**
 * Zod schemas for the two upstream documents
 * and the artifact we ship.
 *
 * emoji-data: https://github.com/iamcal/emoji-data#using-the-data
 * emojilib:   https://github.com/muan/emojilib#usage
 */
import { z } from 'zod'

/**
 * One base emoji from emoji-data's emoji.json.
 *
 * Only the fields the build reads are declared;
 * the rest (skin_variations, image, sheet_x, ...)
 * pass through untouched.
 */
export const EmojiDataRecordSchema = z.object({
    unified: z.string(),
    name: z.string().nullish(),
    short_names: z.array(z.string()).optional(),
    category: z.string().optional(),
    sort_order: z.number().int().optional(),
    has_img_apple: z.boolean().optional(),
}).passthrough()

export const EmojiDataSchema = z.array(EmojiDataRecordSchema)

/**
 * emojilib's emoji-en-US.json: glyph -> keywords,
 * where the first keyword is the emoji's name.
 */
export const KeywordDocumentSchema = z.record(z.string(), z.array(z.string()))

export const EmojiEntrySchema = z.object({
    emoji: z.string().min(1),
    name: z.string().min(1),
    keywords: z.array(z.string()),
    category: z.string(),
    sortOrder: z.number().int(),
}).strict()

export const EmojiArtifactSchema = z.array(EmojiEntrySchema)

export type EmojiDataRecord = z.infer<typeof EmojiDataRecordSchema>
export type KeywordDocument = z.infer<typeof KeywordDocumentSchema>
