/**
 * Byte-range serving of a finished job's artifact (RFC 7233 single ranges).
 * Only a `done` job has an artifact whose size is final.
 */
import fs from 'fs'
import { Readable } from 'stream'
import type { Response } from 'express'
import { NotReadyError, RangeNotSatisfiableError } from '../lib/errors'
import type { Job } from '../models/Job'

export const DEFAULT_CHUNK_BYTES = 1024 * 1024

export interface ByteRange {
  /** inclusive */
  start: number
  /** inclusive */
  end: number
}

export interface RangeResponse {
  statusCode: 200 | 206
  headers: Record<string, string>
  range: ByteRange
  /** Opens the body stream over `range`. */
  body(): Readable
}

const RANGE_HEADER = /^bytes=(\d*)-(\d*)$/

/** `bytes=start-end`, either bound optional (start → 0, end → size - 1). */
export function parseRangeHeader(header: string, fileSize: number): ByteRange {
  const match = RANGE_HEADER.exec(header.trim())
  if (!match) throw new RangeNotSatisfiableError(header)
  const start = match[1] !== '' ? Number(match[1]) : 0
  const end = match[2] !== '' ? Number(match[2]) : fileSize - 1
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
    throw new RangeNotSatisfiableError(header)
  }
  if (start > end || start < 0 || end > fileSize - 1) {
    throw new RangeNotSatisfiableError(header)
  }
  return { start, end }
}

export async function prepareFileResponse(
  filePath: string,
  rangeHeader: string | undefined,
  contentType: string,
  chunkBytes = DEFAULT_CHUNK_BYTES
): Promise<RangeResponse> {
  const { size } = await fs.promises.stat(filePath)
  const headers: Record<string, string> = {
    'Content-Type': contentType,
    'Accept-Ranges': 'bytes',
    'Content-Encoding': 'identity',
    'Content-Length': String(size),
    'Access-Control-Expose-Headers': 'Content-Type, Accept-Ranges, Content-Length, Content-Range, Content-Encoding',
  }
  let statusCode: 200 | 206 = 200
  let range: ByteRange = { start: 0, end: size - 1 }

  if (rangeHeader !== undefined) {
    range = parseRangeHeader(rangeHeader, size)
    headers['Content-Length'] = String(range.end - range.start + 1)
    headers['Content-Range'] = `bytes ${range.start}-${range.end}/${size}`
    statusCode = 206
  }

  const { start, end } = range
  return {
    statusCode,
    headers,
    range,
    body: () =>
      end < start
        ? Readable.from([])
        : fs.createReadStream(filePath, { start, end, highWaterMark: chunkBytes }),
  }
}

/** Rejects with NotReadyError (425) unless the job is `done`. */
export async function prepareJobResponse(
  job: Job,
  rangeHeader: string | undefined,
  chunkBytes = DEFAULT_CHUNK_BYTES
): Promise<RangeResponse> {
  if (job.state !== 'done') throw new NotReadyError()
  return prepareFileResponse(job.paths.artifact, rangeHeader, 'video/mp4', chunkBytes)
}

/** Resolves once a file stream holds its descriptor; rejects when the file cannot be opened. */
function whenOpen(body: Readable): Promise<void> {
  if (!(body instanceof fs.ReadStream) || !body.pending) return Promise.resolve()
  return new Promise((resolve, reject) => {
    const onReady = () => {
      body.off('error', onError)
      resolve()
    }
    const onError = (err: Error) => {
      body.off('ready', onReady)
      reject(err)
    }
    body.once('ready', onReady)
    body.once('error', onError)
  })
}

/**
 * Open the body, then write status, headers and the stream. Nothing is written
 * when the file is gone, so the caller can still answer with an error.
 * Resolves when the body is flushed or the client left.
 */
export async function sendRangeResponse(res: Response, response: RangeResponse): Promise<void> {
  const body = response.body()
  await whenOpen(body)
  res.status(response.statusCode).set(response.headers)
  return new Promise((resolve, reject) => {
    body.on('error', (err) => {
      res.destroy(err)
      reject(err)
    })
    res.on('close', () => {
      body.destroy()
      resolve()
    })
    body.pipe(res)
  })
}
