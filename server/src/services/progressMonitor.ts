/**
 * Reads ffmpeg's `-progress` side channel. ffmpeg appends blocks of key=value
 * lines (…, out_time_ms=<µs>, …, progress=continue|end) for as long as it runs,
 * so the latest sample is always found by scanning backwards from the end.
 */
import fs from 'fs'
import type { FileHandle } from 'fs/promises'
import type pino from 'pino'
import { getLogger, redactFilePath } from '../lib/logger'
import { isErrnoCode } from '../utils/scratchDir'
import { sleep } from '../utils/taskRegistry'

/** Seconds processed, the terminal marker, or nothing yet. */
export type ProgressSample = number | 'end' | null

export const DEFAULT_SCAN_BLOCK_BYTES = 256

export function parseProgressLine(line: string): ProgressSample {
  const trimmed = line.trim()
  if (trimmed === 'progress=end') return 'end'
  if (trimmed.startsWith('out_time_ms=')) {
    const micros = Number(trimmed.slice('out_time_ms='.length))
    return Number.isFinite(micros) ? micros / 1_000_000 : null
  }
  return null
}

/**
 * Latest sample in the file, reading fixed-size blocks from the end.
 * A trailing line without a newline is still being written and is ignored.
 * Missing file → null.
 */
export async function readLatestSample(
  filePath: string,
  blockSize = DEFAULT_SCAN_BLOCK_BYTES
): Promise<ProgressSample> {
  let handle: FileHandle
  try {
    handle = await fs.promises.open(filePath, 'r')
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT')) return null
    throw err
  }
  try {
    const { size } = await handle.stat()
    const buffer = Buffer.alloc(blockSize)
    let position = size
    // Start of the line that continues into the block read before
    let carry = ''
    // No newline seen yet: everything so far belongs to the unterminated tail
    let inTail = true
    while (position > 0) {
      const length = Math.min(blockSize, position)
      position -= length
      const { bytesRead } = await handle.read(buffer, 0, length, position)
      const lines = (buffer.toString('latin1', 0, bytesRead) + carry).split('\n')
      carry = lines.shift() ?? ''
      if (inTail && lines.length > 0) {
        lines.pop()
        inTail = false
      }
      for (let i = lines.length - 1; i >= 0; i--) {
        const sample = parseProgressLine(lines[i])
        if (sample !== null) return sample
      }
    }
    return inTail ? null : parseProgressLine(carry)
  } finally {
    await handle.close()
  }
}

export interface MonitorOptions {
  signal: AbortSignal
  intervalMs?: number
  blockSize?: number
  log?: pino.Logger
}

/**
 * Poll the progress file once per interval and report numeric samples.
 * Returns 'end' at the terminal marker, 'cancelled' when the signal aborts.
 * Read failures are treated as "no sample" and retried on the next tick.
 */
export async function monitorProgress(
  filePath: string,
  onSample: (secondsProcessed: number) => void,
  options: MonitorOptions
): Promise<'end' | 'cancelled'> {
  const { signal, intervalMs = 1000, blockSize, log = getLogger('jobs') } = options
  while (!signal.aborted) {
    await sleep(intervalMs, signal)
    if (signal.aborted) break
    let sample: ProgressSample
    try {
      sample = await readLatestSample(filePath, blockSize)
    } catch (err) {
      log.debug({ msg: 'Progress file unreadable, retrying', file: redactFilePath(filePath), err })
      continue
    }
    if (sample === 'end') return 'end'
    if (sample !== null) onSample(sample)
  }
  return 'cancelled'
}
