import type pino from 'pino'
import { getLogger } from '../lib/logger'
import { sameFingerprint } from '../models/Job'
import type { Fingerprint, Job } from '../models/Job'
import { Mutex } from '../utils/mutex'
import { sleep } from '../utils/taskRegistry'

/** Longest delay setTimeout honours; larger values fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1

export interface JobCacheOptions {
  maxCount: number
  maxSizeBytes: number
  /** Reclaimer sleep when the cache is empty. */
  fallbackIntervalMs: number
  /** Longest reclaimer sleep while some job is still writing its artifact. */
  sizeCheckIntervalMs: number
  now?: () => number
  log?: pino.Logger
}

export interface JobCacheStats {
  count: number
  maxCount: number
  totalBytes: number
  maxBytes: number
}

/**
 * Jobs in recency order: index 0 is the least recently used, the end the most
 * recent. Mutations that await (eviction, removal) run under one mutex; lookups
 * are synchronous and therefore never interleave with anything.
 */
export class JobCache {
  private readonly entries: Job[] = []
  private readonly mutex = new Mutex()
  private readonly now: () => number
  private readonly log: pino.Logger
  private wakeReclaimer?: () => void

  constructor(private readonly options: JobCacheOptions) {
    this.now = options.now ?? Date.now
    this.log = options.log ?? getLogger('jobs')
  }

  get size(): number {
    return this.entries.length
  }

  /** Snapshot, least recent first. */
  jobs(): readonly Job[] {
    return [...this.entries]
  }

  get(id: string): Job | undefined {
    const job = this.entries.find((entry) => entry.id === id)
    if (job) this.promote(job)
    return job
  }

  retrieve(fingerprint: Fingerprint): Job | undefined {
    const job = this.findByFingerprint(fingerprint)
    if (job) this.promote(job)
    return job
  }

  /**
   * Insert as most recent, evicting to respect the bounds first. If a job with
   * the same fingerprint is already cached, that job is returned instead and
   * the caller owns (and must dispose) the one it passed in.
   */
  add(job: Job): Promise<Job> {
    return this.mutex.runExclusive(async () => {
      const existing = this.findByFingerprint(job.fingerprint)
      if (existing) {
        this.promote(existing)
        return existing
      }
      if (this.entries.length >= this.options.maxCount) {
        await this.popOldest('count')
      }
      await this.enforceSize()
      job.touch(this.now())
      this.entries.push(job)
      this.log.info({ msg: 'Job cached', jobId: job.id, count: this.entries.length })
      this.wakeReclaimer?.()
      return job
    })
  }

  /** Unlink without cleanup; lookups stop finding the job at once. Follow with `remove`. */
  detach(job: Job): boolean {
    const index = this.entries.indexOf(job)
    if (index < 0) return false
    this.entries.splice(index, 1)
    return true
  }

  /** Explicit removal; cleans up exactly like an eviction, cached or not. */
  remove(job: Job): Promise<void> {
    return this.mutex.runExclusive(async () => {
      this.detach(job)
      await job.dispose()
      this.log.info({ msg: 'Job removed from cache', jobId: job.id })
    })
  }

  /** Sum of artifact sizes, read from disk. */
  async totalSize(): Promise<number> {
    const sizes = await Promise.all(this.entries.map((job) => job.size()))
    return sizes.reduce((sum, size) => sum + size, 0)
  }

  async stats(): Promise<JobCacheStats> {
    return {
      count: this.entries.length,
      maxCount: this.options.maxCount,
      totalBytes: await this.totalSize(),
      maxBytes: this.options.maxSizeBytes,
    }
  }

  /** One reclaimer cycle: expire the least recent job if idle too long, then apply the size bound. */
  reclaim(): Promise<void> {
    return this.mutex.runExclusive(async () => {
      const oldest = this.entries[0]
      if (oldest && oldest.isExpired(this.now())) {
        await this.popOldest('expired')
      }
      await this.enforceSize()
    })
  }

  /** ms until the next reclaimer cycle is worth running. */
  nextReclaimDelay(): number {
    let delay = this.options.fallbackIntervalMs
    if (this.entries.length > 0) {
      const now = this.now()
      delay = Math.min(...this.entries.map((job) => job.expiresIn(now)))
      if (this.entries.some((job) => !job.isTerminal)) {
        delay = Math.min(delay, this.options.sizeCheckIntervalMs)
      }
    }
    return Math.min(Math.max(0, delay), MAX_TIMER_DELAY_MS)
  }

  /** Runs until `signal` aborts, independently of request traffic. */
  async runReclaimer(signal: AbortSignal): Promise<void> {
    this.log.info({ msg: 'Cache reclaimer started' })
    while (!signal.aborted) {
      try {
        await this.reclaim()
      } catch (err) {
        this.log.error({ msg: 'Cache reclaim cycle failed', err })
      }
      await sleep(this.nextReclaimDelay(), signal, (wake) => {
        this.wakeReclaimer = wake
      })
      this.wakeReclaimer = undefined
    }
    this.log.info({ msg: 'Cache reclaimer stopped' })
  }

  /** Dispose every job (shutdown). */
  clear(): Promise<void> {
    return this.mutex.runExclusive(async () => {
      const jobs = this.entries.splice(0, this.entries.length)
      await Promise.all(jobs.map((job) => job.dispose()))
    })
  }

  private findByFingerprint(fingerprint: Fingerprint): Job | undefined {
    return this.entries.find((entry) => sameFingerprint(entry.fingerprint, fingerprint))
  }

  private promote(job: Job): void {
    const index = this.entries.indexOf(job)
    if (index >= 0) {
      this.entries.splice(index, 1)
      this.entries.push(job)
    }
    job.touch(this.now())
  }

  private async popOldest(reason: 'count' | 'size' | 'expired'): Promise<void> {
    const oldest = this.entries.shift()
    if (!oldest) return
    await oldest.dispose()
    this.log.info({ msg: 'Job evicted from cache', jobId: oldest.id, reason })
  }

  private async enforceSize(): Promise<void> {
    while (this.entries.length > 0 && (await this.totalSize()) > this.options.maxSizeBytes) {
      await this.popOldest('size')
    }
  }
}
