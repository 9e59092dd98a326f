import type { NextFunction, Request, Response } from 'express'
import type { ILogger } from '@aerochart/logger'
import { ChartResolutionError } from '../charts/errors.js'

export interface ErrorBody {
  error: {
    kind: string
    message: string
    retryable: boolean
  }
}

export function errorBody(kind: string, message: string, retryable = false): ErrorBody {
  return { error: { kind, message, retryable } }
}

/** Request validation failure; never reaches a chart source. */
export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidRequestError'
  }
}

/**
 * Terminal middleware: resolution failures keep their kind and status,
 * anything else is a 500 with a generic message.
 */
export function createErrorHandler(log: ILogger) {
  return (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (error instanceof ChartResolutionError) {
      res.status(error.statusCode).json(errorBody(error.kind, error.message, error.retryable))
      return
    }
    if (error instanceof InvalidRequestError) {
      res.status(400).json(errorBody('InvalidRequest', error.message))
      return
    }

    log.error('Unhandled error in chart route', { method: req.method, path: req.path }, error)
    res.status(500).json(errorBody('InternalError', 'Internal server error'))
  }
}
