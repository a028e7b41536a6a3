/**
 * Health, version and ops endpoints.
 */
import { Router, Request, Response } from 'express'
import { sendError } from '../lib/errors'
import { requestLog } from '../middleware/requestId'
import type { JobCache } from '../services/jobCache'
import type { TaskRegistry } from '../utils/taskRegistry'

const release = process.env.RELEASE || 'dev'
const env = process.env.NODE_ENV || 'development'
const BUILD_TIME = process.env.BUILD_TIME || undefined

export function createHealthRouter(cache: JobCache, tasks: TaskRegistry): Router {
  const router = Router()

  /** GET /healthz: process up, no dependency check */
  router.get('/healthz', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' })
  })

  /** GET /version: service, release, buildTime, env */
  router.get('/version', (_req: Request, res: Response) => {
    res.json({
      service: 'api',
      release,
      buildTime: BUILD_TIME,
      env,
    })
  })

  /** GET /ops/cache: cache occupancy, per-state counts and running background tasks */
  router.get('/ops/cache', async (req: Request, res: Response) => {
    try {
      const stats = await cache.stats()
      const states: Record<string, number> = {}
      for (const job of cache.jobs()) {
        states[job.state] = (states[job.state] ?? 0) + 1
      }
      res.set('Cache-Control', 'no-store')
      res.json({ ...stats, states, backgroundTasks: tasks.size })
    } catch (error) {
      sendError(res, error, requestLog(req))
    }
  })

  return router
}
