import express from 'express'
import cors from 'cors'
import rateLimit from 'express-rate-limit'
import { setupSentryErrorHandler, sentryRequestIdScope } from './lib/sentry'
import { requestIdMiddleware } from './middleware/requestId'
import { createDownloadRouter } from './routes/download'
import { createHealthRouter } from './routes/health'
import { createResultRouter } from './routes/result'
import type { JobCache } from './services/jobCache'
import type { DownloadOrchestrator } from './services/orchestrator'
import type { TaskRegistry } from './utils/taskRegistry'

export interface AppDeps {
  cache: JobCache
  orchestrator: DownloadOrchestrator
  tasks: TaskRegistry
  /** Allowed CORS origins; empty allows any origin. */
  corsOrigins: string[]
  streamChunkBytes?: number
}

function normalizeOrigin(origin: string): string {
  return origin.trim().replace(/\/$/, '')
}

export function createApp(deps: AppDeps): express.Express {
  const app = express()
  app.disable('etag')
  app.set('trust proxy', 1)

  const allowedOrigins = new Set(deps.corsOrigins.map(normalizeOrigin))
  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      if (!origin || allowedOrigins.size === 0 || allowedOrigins.has(normalizeOrigin(origin))) {
        callback(null, true)
      } else {
        callback(new Error('Not allowed by CORS'))
      }
    },
    methods: ['GET', 'HEAD', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Range', 'X-Request-Id'],
    exposedHeaders: ['Accept-Ranges', 'Content-Length', 'Content-Range', 'Content-Encoding', 'X-Request-Id'],
    optionsSuccessStatus: 204,
  }

  // Polling every second is expected; this only stops runaway clients
  const downloadLimiter = rateLimit({
    windowMs: 60 * 1000,
    max: 240,
    message: 'Too many requests. Please wait.',
    standardHeaders: true,
    legacyHeaders: false,
  })

  app.use(requestIdMiddleware)
  app.use(sentryRequestIdScope)
  app.use(cors(corsOptions))

  app.use('/download', downloadLimiter, createDownloadRouter(deps.orchestrator))
  app.use('/result', createResultRouter(deps.cache, deps.streamChunkBytes))
  app.use(createHealthRouter(deps.cache, deps.tasks))

  setupSentryErrorHandler(app)
  return app
}
