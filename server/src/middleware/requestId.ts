/**
 * Request ID middleware: reuse x-request-id from the edge or generate a UUID,
 * echo it back, and bind a request-scoped logger.
 */
import type { Request, Response, NextFunction } from 'express'
import type pino from 'pino'
import { v4 as uuidv4 } from 'uuid'
import { withRequestId } from '../lib/logger'

export const REQUEST_ID_HEADER = 'x-request-id'

export interface RequestWithId extends Request {
  requestId?: string
  log?: pino.Logger
}

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.headers[REQUEST_ID_HEADER]
  const id = typeof incoming === 'string' && incoming.trim() ? incoming.trim() : uuidv4()
  const scoped = req as RequestWithId
  scoped.requestId = id
  scoped.log = withRequestId(id)
  res.setHeader(REQUEST_ID_HEADER, id)
  next()
}

/** Logger of the current request (falls back to an unscoped API logger). */
export function requestLog(req: Request): pino.Logger {
  return (req as RequestWithId).log ?? withRequestId(undefined)
}
