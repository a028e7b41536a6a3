import express, { Request, Response } from 'express'
import { BadRequestError, sendError } from '../lib/errors'
import { isQuality } from '../models/Job'
import type { Quality } from '../models/Job'
import { requestLog } from '../middleware/requestId'
import type { DownloadOrchestrator, DownloadRequest } from '../services/orchestrator'

const NO_STORE = {
  'Cache-Control': 'no-store, no-cache, must-revalidate, proxy-revalidate',
  'Pragma': 'no-cache',
  'Expires': '0',
}

/** Validate path and query into a download request. */
export function parseDownloadRequest(
  params: { contentId?: string; episode?: string; lang?: string },
  quality: unknown
): DownloadRequest {
  const contentId = params.contentId?.trim()
  const lang = params.lang?.trim()
  if (!contentId) throw new BadRequestError('Missing content id')
  if (!lang) throw new BadRequestError('Missing language')
  const episode = Number(params.episode)
  if (!Number.isInteger(episode) || episode < 0) {
    throw new BadRequestError(`Invalid episode: ${params.episode}`)
  }
  let tier: Quality = 'high'
  if (quality !== undefined) {
    if (!isQuality(quality)) throw new BadRequestError('quality must be one of high, medium, low')
    tier = quality
  }
  return { contentId, episode, lang, quality: tier }
}

export function createDownloadRouter(orchestrator: DownloadOrchestrator): express.Router {
  const router = express.Router()

  /** GET /download/:contentId/:episode/:lang?quality=high|medium|low: start or poll a conversion. */
  router.get('/:contentId/:episode/:lang', async (req: Request, res: Response) => {
    const log = requestLog(req)
    res.set(NO_STORE)
    try {
      const request = parseDownloadRequest(req.params, req.query.quality)
      const { statusCode, body } = await orchestrator.request(request)
      log.info({ msg: 'Download status', jobId: body.id, status: body.status })
      res.status(statusCode).json(body)
    } catch (error) {
      sendError(res, error, log)
    }
  })

  return router
}
