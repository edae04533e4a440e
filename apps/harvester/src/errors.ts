/**
 * Typed failures that abort a run. Pricing failures never land here: the
 * fetcher degrades them to sentinel offers.
 */

export class HarvesterError extends Error {
  readonly exitCode: number

  constructor(message: string, exitCode = 1, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.exitCode = exitCode
  }
}

export class ConfigError extends HarvesterError {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 2)
    this.issues = issues
  }
}

export class SourceFetchError extends HarvesterError {
  readonly location: string
  readonly statusCode: number

  constructor(location: string, statusCode: number, statusText: string) {
    super(`Failed to fetch source list ${location}: HTTP ${statusCode} ${statusText}`.trim())
    this.location = location
    this.statusCode = statusCode
  }
}

export interface SourceParsePosition {
  line: number
  col: number
}

export class SourceParseError extends HarvesterError {
  readonly position?: SourceParsePosition

  constructor(message: string, position?: SourceParsePosition) {
    super(
      position
        ? `Malformed source list at line ${position.line}, column ${position.col}: ${message}`
        : `Malformed source list: ${message}`
    )
    this.position = position
  }
}
