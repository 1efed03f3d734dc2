import { Injectable, NestMiddleware } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { runWithRequestContext } from '../logger/request-context';

export const CORRELATION_ID_HEADER = 'X-Correlation-ID';

/** Upper bound on a caller-supplied id; longer values are replaced. */
const MAX_CORRELATION_ID_LENGTH = 128;

function readCorrelationId(req: Request): string | undefined {
  const header = req.headers[CORRELATION_ID_HEADER.toLowerCase()];
  const value = Array.isArray(header) ? header[0] : header;
  if (!value || value.length > MAX_CORRELATION_ID_LENGTH) {
    return undefined;
  }
  return value;
}

@Injectable()
export class CorrelationIdMiddleware implements NestMiddleware {
  use(req: Request, res: Response, next: NextFunction): void {
    const correlationId = readCorrelationId(req) ?? uuidv4();

    res.setHeader(CORRELATION_ID_HEADER, correlationId);

    runWithRequestContext(
      {
        correlationId,
        method: req.method,
        path: req.originalUrl,
        ip: req.ip ?? req.socket?.remoteAddress,
      },
      () => next(),
    );
  }
}
