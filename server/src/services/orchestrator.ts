import type pino from 'pino'
import { v4 as uuidv4 } from 'uuid'
import { TranscodeFailedError, errorMessage } from '../lib/errors'
import { getLogger, withJobContext } from '../lib/logger'
import { captureJobError } from '../lib/sentry'
import { Job, fingerprintKey } from '../models/Job'
import type { Fingerprint, JobState } from '../models/Job'
import type { TaskRegistry } from '../utils/taskRegistry'
import { untilAborted } from '../utils/taskRegistry'
import { jobPaths } from '../utils/scratchDir'
import type { JobCache } from './jobCache'
import { selectVariant } from './manifest'
import type { VariantEnumerator } from './manifest'
import { monitorProgress } from './progressMonitor'
import type { SourceResolver } from './source'
import type { TranscodeHandle, TranscodeProcess, Transcoder } from './transcoder'

export type DownloadRequest = Fingerprint

/** JSON body of GET /download/... */
export interface StatusPayload {
  status: JobState
  id: string
  result: string | null
  message?: string
  progress?: number | null
  estimated_remaining_time?: number | null
}

export interface StatusResponse {
  statusCode: number
  body: StatusPayload
}

export interface OrchestratorDeps {
  cache: JobCache
  tasks: TaskRegistry
  resolver: SourceResolver
  variants: VariantEnumerator
  transcoder: Transcoder
  scratchDir: string
  expirationMs: number
  progressIntervalMs?: number
  now?: () => number
  log?: pino.Logger
}

function round2(value: number): number {
  return Math.round(value * 100) / 100
}

/** Torn or missing readings (undefined, NaN, negative) are reported as absent. */
function presentOrNull(value: number | undefined): number | null {
  if (value === undefined || !Number.isFinite(value) || value < 0) return null
  return round2(value)
}

export function resultLink(id: string): string {
  return `/result/${id}`
}

export function renderStatus(job: Job): StatusResponse {
  const body: StatusPayload = { status: job.state, id: job.id, result: null }
  switch (job.state) {
    case 'done':
      body.result = resultLink(job.id)
      return { statusCode: 200, body }
    case 'error':
      body.message = job.errorMessage ?? 'Conversion failed'
      return { statusCode: 500, body }
    case 'in_progress': {
      const progress = job.progress
      body.progress = presentOrNull(progress === undefined ? undefined : progress * 100)
      body.estimated_remaining_time = presentOrNull(job.remainingTime)
      return { statusCode: 200, body }
    }
    case 'started':
      return { statusCode: 200, body }
  }
}

/**
 * Entry point per download request: find or start the job for a fingerprint
 * and render its status.
 */
export class DownloadOrchestrator {
  private readonly pending = new Map<string, Promise<Job>>()
  private readonly now: () => number
  private readonly log: pino.Logger

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? Date.now
    this.log = deps.log ?? getLogger('jobs')
  }

  /**
   * Resolution failures reject (nothing is cached). An `error` job is reported
   * to exactly one reader and unlinked before anything awaits; a reader that
   * loses that claim looks the fingerprint up again and starts over.
   */
  async request(req: DownloadRequest): Promise<StatusResponse> {
    for (;;) {
      const job = await this.obtain(req)
      if (job.state !== 'error') return renderStatus(job)
      if (!job.claimErrorReport()) continue
      const response = renderStatus(job)
      this.deps.cache.detach(job)
      await this.deps.cache.remove(job)
      return response
    }
  }

  /** Cached job, the in-flight creation for the same fingerprint, or a new one. */
  private obtain(req: DownloadRequest): Promise<Job> {
    const cached = this.deps.cache.retrieve(req)
    if (cached) return Promise.resolve(cached)
    const key = fingerprintKey(req)
    const inFlight = this.pending.get(key)
    if (inFlight) return inFlight
    const creation = this.create(req).finally(() => {
      this.pending.delete(key)
    })
    this.pending.set(key, creation)
    return creation
  }

  private async create(req: DownloadRequest): Promise<Job> {
    const { resolver, variants, transcoder, cache, scratchDir, expirationMs } = this.deps
    const source = await resolver.resolve(req.contentId, req.episode, req.lang)
    const variant = selectVariant(await variants.listVariants(source.sourceUrl), req.quality)

    const id = uuidv4()
    const paths = jobPaths(scratchDir, id)
    const init = {
      id,
      fingerprint: { ...req },
      paths,
      imageUrl: source.imageUrl,
      expirationMs,
      createdAt: this.now(),
    }

    let handle: TranscodeHandle
    try {
      handle = await transcoder.start(variant.url, paths.artifact)
    } catch (err) {
      const failed = Job.failed({ ...init, totalSeconds: 0 }, errorMessage(err))
      this.log.warn({ msg: 'Transcoder launch failed', jobId: failed.id, error: failed.errorMessage })
      captureJobError(failed.id, 'launch', err)
      return failed
    }

    const job = new Job({
      ...init,
      totalSeconds: handle.totalDurationSeconds,
      process: handle.process,
    })
    this.track(job, handle.process)
    const registered = await cache.add(job)
    if (registered !== job) {
      // Lost a race against an identical request
      await job.dispose()
      return registered
    }
    this.log.info({ msg: 'Conversion started', jobId: job.id, key: fingerprintKey(req), height: variant.height })
    return job
  }

  /** Spawn the task that follows progress until the process exits. */
  private track(job: Job, transcodeProcess: TranscodeProcess): void {
    const log = withJobContext(job.id)
    job.task = this.deps.tasks.spawn(
      `track:${job.id}`,
      async (signal) => {
        const startedAt = this.now()
        const monitorStop = new AbortController()
        const stopMonitor = () => monitorStop.abort()
        signal.addEventListener('abort', stopMonitor, { once: true })
        const monitor = monitorProgress(
          job.paths.progress,
          (seconds) => job.recordProgress(seconds, (this.now() - startedAt) / 1000),
          { signal: monitorStop.signal, intervalMs: this.deps.progressIntervalMs, log }
        )
        try {
          const exitCode = await Promise.race([transcodeProcess.wait(), untilAborted(signal).then(() => null)])
          stopMonitor()
          await monitor
          if (exitCode === null) return
          job.finish(exitCode)
          if (exitCode !== 0) {
            captureJobError(job.id, 'runtime', new TranscodeFailedError(exitCode))
          }
        } finally {
          signal.removeEventListener('abort', stopMonitor)
        }
      },
      {
        onError: (err) => {
          log.error({ msg: 'Job tracking failed', err })
          job.fail(errorMessage(err))
        },
      }
    )
  }
}
