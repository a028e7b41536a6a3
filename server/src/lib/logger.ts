/**
 * Structured JSON logger for the API and the background job loops.
 * Single format: level, timestamp, service, env, release, requestId/jobId.
 * Use LOG_LEVEL=debug to see per-tick progress reads.
 */
import pino from 'pino'

const release = process.env.RELEASE || 'dev'
const env = process.env.NODE_ENV || 'development'
const level = process.env.LOG_LEVEL || (env === 'test' ? 'silent' : 'info')

/** Keys (and nested paths) to redact from log output. */
const REDACT_PATHS = [
  'authorization',
  'cookie',
  'req.headers.authorization',
  'req.headers.cookie',
  'SENTRY_DSN',
]

export type ServiceName = 'api' | 'jobs'

function createBaseLogger(service: ServiceName): pino.Logger {
  return pino({
    level,
    base: { service, env, release },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  })
}

const loggers = new Map<ServiceName, pino.Logger>()

export function getLogger(service: ServiceName): pino.Logger {
  let logger = loggers.get(service)
  if (!logger) {
    logger = createBaseLogger(service)
    loggers.set(service, logger)
  }
  return logger
}

/** Child logger with requestId (API request context). */
export function withRequestId(requestId: string | undefined): pino.Logger {
  return getLogger('api').child({ requestId: requestId || undefined })
}

/** Child logger bound to one conversion job. */
export function withJobContext(jobId: string, requestId?: string): pino.Logger {
  return getLogger('jobs').child({ jobId, requestId: requestId || undefined })
}

/** Keep only the basename of a scratch file for logging. */
export function redactFilePath(path: string): string {
  if (!path) return '[REDACTED]'
  const parts = path.replace(/\\/g, '/').split('/')
  return parts[parts.length - 1] || '[REDACTED]'
}
