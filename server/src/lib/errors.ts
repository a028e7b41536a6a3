import type { Response } from 'express'
import type pino from 'pino'

/** Base class for failures that map onto an HTTP status. */
export class DownloadError extends Error {
  constructor(message: string, readonly statusCode: number) {
    super(message)
    this.name = new.target.name
  }
}

export class BadRequestError extends DownloadError {
  constructor(message: string) {
    super(message, 400)
  }
}

/** Source lookup failed. Never cached; surfaced to the caller right away. */
export class ResolutionError extends DownloadError {
  constructor(message: string, statusCode = 404) {
    super(message, statusCode)
  }
}

/** The language/episode combination does not exist. */
export class NotAvailableError extends ResolutionError {
  constructor(message: string) {
    super(message, 404)
  }
}

/** The fetched document is not an HLS playlist. */
export class InvalidManifestError extends ResolutionError {
  constructor(message: string) {
    super(message, 502)
  }
}

/** The transcoder could not be started. */
export class LaunchError extends DownloadError {
  constructor(message: string) {
    super(message, 500)
  }
}

/** The transcoder exited with a non-zero code. */
export class TranscodeFailedError extends DownloadError {
  constructor(readonly exitCode: number) {
    super(`Transcoder exited with code ${exitCode}`, 500)
  }
}

export class NotReadyError extends DownloadError {
  constructor(message = 'Conversion not finished.') {
    super(message, 425)
  }
}

export class NotFoundError extends DownloadError {
  constructor(message = 'Link expired or invalid.') {
    super(message, 404)
  }
}

export class RangeNotSatisfiableError extends DownloadError {
  constructor(rangeHeader: string) {
    super(`Invalid request range (Range: ${JSON.stringify(rangeHeader)})`, 416)
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}

/** Send `{ message }` with the error's status; unknown errors are logged and become 500. */
export function sendError(res: Response, err: unknown, log: pino.Logger): void {
  if (err instanceof DownloadError) {
    res.status(err.statusCode).json({ message: err.message })
    return
  }
  log.error({ msg: 'Unhandled request error', err })
  res.status(500).json({ message: errorMessage(err) || 'Internal error' })
}
