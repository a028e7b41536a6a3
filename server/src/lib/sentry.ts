/**
 * Sentry for the API and job tracking. Enabled only when SENTRY_DSN is set.
 * Env: SENTRY_DSN, SENTRY_ENV (default NODE_ENV), SENTRY_TRACES_SAMPLE_RATE (default 0.05), RELEASE.
 */
import * as Sentry from '@sentry/node'
import type { Express, Request, Response, NextFunction } from 'express'
import type { RequestWithId } from '../middleware/requestId'
import { getLogger } from './logger'

const DSN = process.env.SENTRY_DSN
const ENV = process.env.SENTRY_ENV || process.env.NODE_ENV || 'development'
const RELEASE = process.env.RELEASE || undefined
const TRACES_SAMPLE_RATE = Math.min(
  1,
  Math.max(0, parseFloat(process.env.SENTRY_TRACES_SAMPLE_RATE || '0.05') || 0.05)
)

function isEnabled(): boolean {
  return Boolean(DSN && DSN.trim())
}

export function initSentry(): void {
  if (!isEnabled()) return
  try {
    Sentry.init({
      dsn: DSN,
      environment: ENV,
      release: RELEASE,
      tracesSampleRate: TRACES_SAMPLE_RATE,
      integrations: [Sentry.expressIntegration()],
    })
  } catch (err) {
    getLogger('api').warn({ msg: 'Sentry init failed', err })
  }
}

/** Call after all routes. No-op if SENTRY_DSN not set. */
export function setupSentryErrorHandler(app: Express): void {
  if (!isEnabled()) return
  Sentry.setupExpressErrorHandler(app)
}

/** Set requestId on the Sentry scope. Run after requestIdMiddleware. */
export function sentryRequestIdScope(req: Request, _res: Response, next: NextFunction): void {
  const id = (req as RequestWithId).requestId
  if (id && isEnabled()) Sentry.getCurrentScope().setTag('request_id', id)
  next()
}

/** Capture a launch or runtime failure of a conversion job. */
export function captureJobError(jobId: string, stage: 'launch' | 'runtime', err: unknown): void {
  if (!isEnabled()) return
  Sentry.withScope((scope) => {
    scope.setTag('service', 'jobs')
    scope.setTag('job_id', jobId)
    scope.setTag('job_stage', stage)
    Sentry.captureException(err)
  })
}
