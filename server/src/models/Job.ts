import { v4 as uuidv4 } from 'uuid'
import type pino from 'pino'
import { TranscodeFailedError } from '../lib/errors'
import { withJobContext } from '../lib/logger'
import type { TranscodeProcess } from '../services/transcoder'
import type { TaskHandle } from '../utils/taskRegistry'
import { fileSize, removeFile } from '../utils/scratchDir'
import type { JobPaths } from '../utils/scratchDir'

export type Quality = 'high' | 'medium' | 'low'

export const QUALITIES: readonly Quality[] = ['high', 'medium', 'low']

export function isQuality(value: unknown): value is Quality {
  return QUALITIES.some((quality) => quality === value)
}

/** Wire values of the job life cycle. `done` and `error` are terminal. */
export type JobState = 'started' | 'in_progress' | 'done' | 'error'

/** Logical request attributes identifying "the same requested artifact". */
export interface Fingerprint {
  contentId: string
  episode: number
  lang: string
  quality: Quality
}

export function fingerprintKey(fp: Fingerprint): string {
  return `${fp.contentId}:${fp.episode}:${fp.lang}:${fp.quality}`
}

export function sameFingerprint(a: Fingerprint, b: Fingerprint): boolean {
  return fingerprintKey(a) === fingerprintKey(b)
}

export interface JobInit {
  id?: string
  fingerprint: Fingerprint
  paths: JobPaths
  totalSeconds: number
  expirationMs: number
  process?: TranscodeProcess
  imageUrl?: string
  /** epoch ms */
  createdAt: number
}

/** One conversion attempt and its derived status. */
export class Job {
  readonly id: string
  readonly fingerprint: Fingerprint
  readonly paths: JobPaths
  readonly totalSeconds: number
  readonly expirationMs: number
  readonly imageUrl?: string
  readonly createdAt: number
  readonly process?: TranscodeProcess

  state: JobState = 'started'
  lastAccess: number
  secondsProcessed = 0
  remainingTime?: number
  errorMessage?: string
  task?: TaskHandle

  private readonly log: pino.Logger
  private errorReported = false

  constructor(init: JobInit) {
    this.id = init.id ?? uuidv4()
    this.fingerprint = init.fingerprint
    this.paths = init.paths
    this.totalSeconds = init.totalSeconds
    this.expirationMs = init.expirationMs
    this.imageUrl = init.imageUrl
    this.process = init.process
    this.createdAt = init.createdAt
    this.lastAccess = init.createdAt
    this.log = withJobContext(this.id)
  }

  /** A job whose launch failed: it starts (and stays) in `error`. */
  static failed(init: JobInit, message: string): Job {
    const job = new Job(init)
    job.state = 'error'
    job.errorMessage = message
    return job
  }

  get isTerminal(): boolean {
    return this.state === 'done' || this.state === 'error'
  }

  /** Fraction in [0, 1]; undefined when the total duration is unknown. */
  get progress(): number | undefined {
    if (!(this.totalSeconds > 0)) return undefined
    return this.secondsProcessed / this.totalSeconds
  }

  /**
   * Record a progress sample. `elapsedSeconds` is wall-clock time since tracking
   * started; the remaining time is a plain linear extrapolation.
   */
  recordProgress(secondsProcessed: number, elapsedSeconds: number): void {
    if (this.isTerminal) return
    this.state = 'in_progress'
    this.secondsProcessed = secondsProcessed
    if (secondsProcessed > 0 && this.totalSeconds > 0) {
      this.remainingTime = elapsedSeconds * (this.totalSeconds / secondsProcessed) - elapsedSeconds
    }
  }

  /** Process exit is authoritative: 0 → done, anything else → error. */
  finish(exitCode: number): void {
    if (this.isTerminal) return
    if (exitCode === 0) {
      this.state = 'done'
      this.log.info({ msg: 'Conversion finished' })
      return
    }
    this.fail(new TranscodeFailedError(exitCode).message)
  }

  fail(message: string): void {
    if (this.isTerminal) return
    this.state = 'error'
    this.errorMessage = message
    this.log.warn({ msg: 'Conversion failed', error: message })
  }

  /** True for the first caller only; an `error` job is reported once. */
  claimErrorReport(): boolean {
    if (this.state !== 'error' || this.errorReported) return false
    this.errorReported = true
    return true
  }

  touch(now: number): void {
    this.lastAccess = now
  }

  /** ms until idle expiration; negative once expired. */
  expiresIn(now: number): number {
    return this.lastAccess + this.expirationMs - now
  }

  isExpired(now: number): boolean {
    return this.expiresIn(now) < 0
  }

  /** Current artifact size; read from disk on every call since it grows while converting. */
  size(): Promise<number> {
    return fileSize(this.paths.artifact)
  }

  /** Terminate the process, cancel tracking and delete every file of this job. */
  async dispose(): Promise<void> {
    if (this.process && this.process.exitCode === null) {
      this.process.terminate()
    }
    this.task?.cancel()
    await Promise.all([
      removeFile(this.paths.artifact, this.log),
      removeFile(this.paths.manifest, this.log),
      removeFile(this.paths.progress, this.log),
    ])
  }
}
