import { once } from 'events'
import type { Express } from 'express'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { createApp } from '../app'
import { Job } from '../models/Job'
import type { Fingerprint } from '../models/Job'
import type { Variant, VariantEnumerator } from '../services/manifest'
import type { ResolvedSource, SourceResolver } from '../services/source'
import { JobCache } from '../services/jobCache'
import { DownloadOrchestrator } from '../services/orchestrator'
import type { TranscodeHandle, TranscodeProcess, Transcoder } from '../services/transcoder'
import { jobPaths } from '../utils/scratchDir'
import { TaskRegistry } from '../utils/taskRegistry'

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'hls-dl-test-'))
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true })
}

/** Process stand-in whose exit the test controls. */
export class FakeProcess implements TranscodeProcess {
  exitCode: number | null = null
  terminated = false
  private resolveExit: (code: number) => void = () => undefined
  private readonly exited = new Promise<number>((resolve) => {
    this.resolveExit = resolve
  })

  wait(): Promise<number> {
    return this.exited
  }

  exit(code: number): void {
    if (this.exitCode !== null) return
    this.exitCode = code
    this.resolveExit(code)
  }

  terminate(): void {
    this.terminated = true
    this.exit(255)
  }
}

export class FakeTranscoder implements Transcoder {
  readonly calls: { variantUrl: string; outputPath: string; process: FakeProcess }[] = []
  failWith?: Error
  delayMs = 0

  constructor(private readonly totalDurationSeconds = 10) {}

  async start(variantUrl: string, outputPath: string): Promise<TranscodeHandle> {
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs))
    }
    if (this.failWith) throw this.failWith
    const fake = new FakeProcess()
    this.calls.push({ variantUrl, outputPath, process: fake })
    return { process: fake, totalDurationSeconds: this.totalDurationSeconds }
  }
}

export class FakeResolver implements SourceResolver {
  calls = 0
  failWith?: Error

  async resolve(contentId: string, episode: number, lang: string): Promise<ResolvedSource> {
    this.calls += 1
    if (this.failWith) throw this.failWith
    return {
      sourceUrl: `https://cdn.test/${contentId}/${episode}/${lang}/master.m3u8`,
      imageUrl: 'https://cdn.test/poster.jpg',
    }
  }
}

export class FakeVariants implements VariantEnumerator {
  failWith?: Error
  variants: Variant[] = [
    { url: 'https://cdn.test/1080.m3u8', width: 1920, height: 1080 },
    { url: 'https://cdn.test/360.m3u8', width: 640, height: 360 },
    { url: 'https://cdn.test/720.m3u8', width: 1280, height: 720 },
  ]

  async listVariants(): Promise<Variant[]> {
    if (this.failWith) throw this.failWith
    return this.variants
  }
}

export interface TestServer {
  url: string
  close(): Promise<void>
}

/** Serve the app on an ephemeral loopback port of this process. */
export async function startServer(app: Express): Promise<TestServer> {
  const server = app.listen(0, '127.0.0.1')
  await once(server, 'listening')
  const address = server.address()
  if (address === null || typeof address === 'string') {
    throw new Error('server has no TCP address')
  }
  return {
    url: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections()
        server.close((err) => (err ? reject(err) : resolve()))
      }),
  }
}

export interface AppHarness {
  app: Express
  cache: JobCache
  tasks: TaskRegistry
  resolver: FakeResolver
  variants: FakeVariants
  transcoder: FakeTranscoder
  orchestrator: DownloadOrchestrator
  /** Cancel tracking and dispose every cached job. */
  shutdown(): Promise<void>
}

/** The real Express app over in-process fakes for the catalog, playlists and ffmpeg. */
export function createAppHarness(dir: string, streamChunkBytes?: number): AppHarness {
  const cache = new JobCache({
    maxCount: 10,
    maxSizeBytes: 1_000_000,
    fallbackIntervalMs: 60_000,
    sizeCheckIntervalMs: 10_000,
  })
  const tasks = new TaskRegistry()
  const resolver = new FakeResolver()
  const variants = new FakeVariants()
  const transcoder = new FakeTranscoder()
  const orchestrator = new DownloadOrchestrator({
    cache,
    tasks,
    resolver,
    variants,
    transcoder,
    scratchDir: dir,
    expirationMs: 60_000,
    progressIntervalMs: 5,
  })
  const app = createApp({ cache, orchestrator, tasks, corsOrigins: [], streamChunkBytes })
  return {
    app,
    cache,
    tasks,
    resolver,
    variants,
    transcoder,
    orchestrator,
    shutdown: async () => {
      await tasks.shutdown()
      await cache.clear()
    },
  }
}

export interface MakeJobOptions {
  id?: string
  fingerprint?: Partial<Fingerprint>
  expirationMs?: number
  createdAt?: number
  totalSeconds?: number
  process?: TranscodeProcess
}

let counter = 0

export function makeJob(dir: string, options: MakeJobOptions = {}): Job {
  counter += 1
  const id = options.id ?? `job-${counter}`
  return new Job({
    id,
    fingerprint: {
      contentId: `content-${counter}`,
      episode: 1,
      lang: 'vostfr',
      quality: 'high',
      ...options.fingerprint,
    },
    paths: jobPaths(dir, id),
    totalSeconds: options.totalSeconds ?? 10,
    expirationMs: options.expirationMs ?? 60_000,
    createdAt: options.createdAt ?? 0,
    process: options.process,
  })
}

/** Write every scratch file of the job; the artifact gets `artifactBytes` bytes. */
export function writeJobFiles(job: Job, artifactBytes: number): void {
  fs.writeFileSync(job.paths.artifact, Buffer.alloc(artifactBytes, 1))
  fs.writeFileSync(job.paths.manifest, '#EXTM3U\n')
  fs.writeFileSync(job.paths.progress, 'out_time_ms=0\nprogress=continue\n')
}
