export interface EmojiEntry {
    /** emoji glyph */
    readonly emoji: string
    /** lowercase display name */
    readonly name: string
    /** search terms, most relevant first */
    readonly keywords: readonly string[]
    readonly category: string
    /** ranking tiebreaker, lower is more canonical */
    readonly sortOrder: number
}

/** glyph -> emojilib keywords */
export type KeywordMap = ReadonlyMap<string, readonly string[]>

export type SkipReason =
    | 'missing-apple-image'
    | 'skin-tone-variant'
    | 'invalid-codepoint'
    | 'duplicate'

export type SkipCounts = Record<SkipReason, number>

export type Eligibility =
    | { eligible: true; glyph: string }
    | { eligible: false; reason: SkipReason }

export interface BuildResult {
    entries: readonly EmojiEntry[]
    skipped: SkipCounts
}
