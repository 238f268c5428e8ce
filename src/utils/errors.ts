/**
 * A remote source could not be fetched,
 * parsed, or did not have the expected shape.
 */
export class SourceFetchError extends Error {
  readonly url: string
  readonly status?: number

  constructor(
    message: string,
    options: { url: string; status?: number; cause?: unknown },
  ) {
    super(message, { cause: options.cause })
    this.name = 'SourceFetchError'
    this.url = options.url
    this.status = options.status
  }
}

/**
 * A `unified` segment is not a hex code point.
 */
export class CodepointError extends Error {
  readonly segment: string

  constructor(segment: string, unified: string) {
    super(`invalid code point "${segment}" in "${unified}"`)
    this.name = 'CodepointError'
    this.segment = segment
  }
}

/**
 * The written artifact does not read back
 * as the entries that were serialized.
 */
export class ArtifactError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ArtifactError'
  }
}
