// https://github.com/iamcal/emoji-data
export const EMOJI_DATA_URL = 'https://raw.githubusercontent.com/iamcal/emoji-data/master/emoji.json'
// https://github.com/muan/emojilib
export const EMOJILIB_URL = 'https://raw.githubusercontent.com/muan/emojilib/main/dist/emoji-en-US.json'

export const OUT_DIR = './src/artifacts'
export const EMOJI_JSON = `${OUT_DIR}/emojis.json`

export const DEFAULT_CATEGORY = 'Other'
// Unranked records sort after everything emoji-data ranks.
export const DEFAULT_SORT_ORDER = 9999

// Fitzpatrick modifiers, U+1F3FB-U+1F3FF
export const SKIN_TONE_MIN = 0x1f3fb
export const SKIN_TONE_MAX = 0x1f3ff

export const MAX_CODE_POINT = 0x10ffff

export const SAMPLE_SIZE = 3
export const SAMPLE_KEYWORDS = 5
export const ZSTD_LEVEL = 19
