/**
 * Guard - Express Middleware
 *
 * Opens one trace per request and closes it exactly once, when the response
 * finishes or when the connection closes first.
 *
 * On every request:
 * - Sets res.locals.guard (GuardContext)
 * - Sets res.locals.traceClosed (Promise<ExportResult[]>) once the trace is closed
 */
import { NextFunction, Request, RequestHandler, Response } from 'express';
import { Outcome, SUCCESS, failure } from '../types';
import { ExportResult } from '../exporters';
import { describeError } from '../utils/errors';
import logger from '../utils/logger';
import { Guard } from './guard';

export const SESSION_ID_HEADER = 'x-session-id';
export const USER_ID_HEADER = 'x-user-id';

function headerValue(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first ? first : undefined;
}

export function guardMiddleware(guard: Guard): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const context = guard.openTrace({
      sessionId: headerValue(req, SESSION_ID_HEADER),
      userId: headerValue(req, USER_ID_HEADER),
      metadata: { method: req.method, path: req.originalUrl },
    });
    res.locals.guard = context;

    let closed = false;
    const close = (outcome: Outcome): void => {
      if (closed) {
        return;
      }
      closed = true;

      const pending: Promise<ExportResult[]> = guard.closeTrace(context, outcome).catch((error: unknown) => {
        logger.error({ trace_id: context.trace.trace_id, error: describeError(error) }, 'Failed to close request trace');
        return [];
      });
      res.locals.traceClosed = pending;
    };

    res.on('finish', () => {
      close(
        res.statusCode >= 500
          ? failure(new Error(`Request failed with status ${res.statusCode}`))
          : SUCCESS,
      );
    });
    res.on('close', () => {
      close(failure(new Error('Request cancelled before the response finished')));
    });

    logger.debug({ trace_id: context.trace.trace_id, session_id: context.sessionId }, 'Request trace opened');

    next();
  };
}
