import express, { Request, Response } from 'express'
import { NotFoundError, sendError } from '../lib/errors'
import type { Job } from '../models/Job'
import { requestLog } from '../middleware/requestId'
import type { JobCache } from '../services/jobCache'
import { prepareJobResponse, sendRangeResponse } from '../services/rangeContent'

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
}

/** Landing page of a finished conversion: player, thumbnail and download link. */
export function renderResultPage(job: Job): string {
  const { contentId, episode, lang } = job.fingerprint
  const title = escapeHtml(`${contentId} episode ${episode} (${lang})`)
  const videoUrl = escapeHtml(`/result/video/${job.id}`)
  const poster = job.imageUrl ? ` poster="${escapeHtml(job.imageUrl)}"` : ''
  const fileName = escapeHtml(`${contentId}-${episode}-${lang}.mp4`)
  return [
    '<!doctype html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    `<title>${title}</title>`,
    '</head>',
    '<body>',
    `<h1>${title}</h1>`,
    `<video controls preload="metadata" src="${videoUrl}"${poster}></video>`,
    `<p><a href="${videoUrl}" download="${fileName}">Download</a></p>`,
    '</body>',
    '</html>',
  ].join('\n')
}

export function createResultRouter(cache: JobCache, chunkBytes?: number): express.Router {
  const router = express.Router()

  /** GET /result/video/:id: byte-range stream of the artifact (404 unknown, 425 not done, 416 bad range). */
  router.get('/video/:id', async (req: Request, res: Response) => {
    const log = requestLog(req)
    try {
      const job = cache.get(req.params.id)
      if (!job) throw new NotFoundError()
      const response = await prepareJobResponse(job, req.headers.range, chunkBytes)
      await sendRangeResponse(res, response)
    } catch (error) {
      if (res.headersSent) {
        log.warn({ msg: 'Video stream interrupted', err: error })
        return
      }
      sendError(res, error, log)
    }
  })

  /** GET /result/:id: page linking to the video once the conversion is done. */
  router.get('/:id', (req: Request, res: Response) => {
    const job = cache.get(req.params.id)
    if (!job || job.state !== 'done') {
      res.status(404).type('text/plain').send('Link expired or invalid.')
      return
    }
    res.type('html').send(renderResultPage(job))
  })

  return router
}
