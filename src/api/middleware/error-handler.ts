import type { Request, Response, NextFunction } from 'express'
import type { Logger } from 'pino'
import { ZodError } from 'zod'
import { DispatchError } from '../../services/errors'

const statusOf = (err: unknown): number | undefined =>
  typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
    ? err.status
    : undefined

export function createErrorHandler(logger: Logger) {
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof ZodError) {
      res.status(400).json({ message: 'Invalid request', issues: err.issues })
      return
    }
    if (err instanceof DispatchError) {
      if (err.statusCode >= 500) {
        logger.error({ err, path: req.path }, err.message)
      } else {
        logger.warn({ err, path: req.path }, err.message)
      }
      res.status(err.statusCode).json({ message: err.message, error: err.name })
      return
    }
    // express.json の構文エラーなど、status を持つクライアントエラー
    const status = statusOf(err)
    if (status !== undefined && status >= 400 && status < 500) {
      logger.warn({ err, path: req.path }, 'Rejected request')
      res.status(status).json({ message: err instanceof Error ? err.message : 'Bad Request' })
      return
    }
    logger.error({ err, path: req.path }, 'Unhandled error')
    res.status(500).json({ message: 'Internal Server Error' })
  }
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ message: 'Not Found' })
}
