import './env'
import { initSentry } from './lib/sentry'

initSentry()
import { createApp } from './app'
import { getLogger } from './lib/logger'
import { FfmpegTranscoder } from './services/ffmpeg'
import { JobCache } from './services/jobCache'
import { HlsVariantEnumerator } from './services/manifest'
import { DownloadOrchestrator } from './services/orchestrator'
import { CatalogSourceResolver } from './services/source'
import { loadDownloadConfig } from './utils/downloadConfig'
import { prepareScratchDir } from './utils/scratchDir'
import { TaskRegistry } from './utils/taskRegistry'

const log = getLogger('api')
const config = loadDownloadConfig()

const tasks = new TaskRegistry()
const cache = new JobCache({
  maxCount: config.maxJobs,
  maxSizeBytes: config.maxSizeBytes,
  fallbackIntervalMs: config.reclaimFallbackMs,
  sizeCheckIntervalMs: config.sizeCheckIntervalMs,
})
const orchestrator = new DownloadOrchestrator({
  cache,
  tasks,
  resolver: new CatalogSourceResolver(config.sourceApiUrl),
  variants: new HlsVariantEnumerator(),
  transcoder: new FfmpegTranscoder(),
  scratchDir: config.scratchDir,
  expirationMs: config.expirationMs,
  progressIntervalMs: config.progressIntervalMs,
})

const app = createApp({
  cache,
  orchestrator,
  tasks,
  corsOrigins: config.corsOrigins,
  streamChunkBytes: config.streamChunkBytes,
})

async function main(): Promise<void> {
  await prepareScratchDir(config.scratchDir, log)
  tasks.spawn('reclaimer', (signal) => cache.runReclaimer(signal))

  const server = app.listen(config.port, () => {
    log.info({ msg: 'Server listening', port: config.port, maxJobs: config.maxJobs, maxSizeBytes: config.maxSizeBytes })
  })

  server.on('error', (error: NodeJS.ErrnoException) => {
    if (error.code === 'EADDRINUSE') {
      log.fatal({ msg: `Port ${config.port} is already in use. Set PORT in your .env file.` })
    } else {
      log.fatal({ msg: 'Server error', err: error })
    }
    process.exit(1)
  })

  let shuttingDown = false
  const shutdown = (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    log.info({ msg: `${signal} received, shutting down gracefully` })
    server.close()
    tasks
      .shutdown()
      .then(() => cache.clear())
      .then(() => {
        log.info({ msg: 'Server closed' })
        process.exit(0)
      })
      .catch((err: unknown) => {
        log.error({ msg: 'Shutdown failed', err })
        process.exit(1)
      })
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'))
  process.on('SIGINT', () => shutdown('SIGINT'))
}

main().catch((err: unknown) => {
  log.fatal({ msg: 'Startup failed', err })
  process.exit(1)
})
