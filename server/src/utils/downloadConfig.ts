/**
 * Cache bounds, timings and external endpoints, read from env.
 * Invalid or missing numbers fall back to the defaults below.
 */

const GIB = 1024 ** 3
const HOUR_MS = 60 * 60 * 1000

export interface DownloadConfig {
  port: number
  scratchDir: string
  /** MAX_ELEMENTS */
  maxJobs: number
  /** MAX_SIZE, given in GiB */
  maxSizeBytes: number
  /** JOB_EXPIRATION_HOURS */
  expirationMs: number
  reclaimFallbackMs: number
  sizeCheckIntervalMs: number
  progressIntervalMs: number
  streamChunkBytes: number
  sourceApiUrl: string
  corsOrigins: string[]
}

function positiveNumber(value: string | undefined, fallback: number): number {
  if (value == null || value.trim() === '') return fallback
  const parsed = Number(value)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback
}

export function loadDownloadConfig(env: NodeJS.ProcessEnv = process.env): DownloadConfig {
  return {
    port: Math.floor(positiveNumber(env.PORT, 3001)),
    scratchDir: env.SCRATCH_DIR?.trim() || './tmp',
    maxJobs: Math.floor(positiveNumber(env.MAX_ELEMENTS, 40)),
    maxSizeBytes: Math.floor(positiveNumber(env.MAX_SIZE, 15) * GIB),
    expirationMs: Math.floor(positiveNumber(env.JOB_EXPIRATION_HOURS, 12) * HOUR_MS),
    reclaimFallbackMs: Math.floor(positiveNumber(env.RECLAIM_FALLBACK_MS, 60_000)),
    sizeCheckIntervalMs: Math.floor(positiveNumber(env.SIZE_CHECK_INTERVAL_MS, 10_000)),
    progressIntervalMs: Math.floor(positiveNumber(env.PROGRESS_INTERVAL_MS, 1000)),
    streamChunkBytes: Math.floor(positiveNumber(env.STREAM_CHUNK_BYTES, 1024 * 1024)),
    sourceApiUrl: (env.SOURCE_API_URL?.trim() || 'http://localhost:8081').replace(/\/$/, ''),
    corsOrigins: (env.CORS_ORIGINS || '').split(',').map((o) => o.trim()).filter(Boolean),
  }
}
