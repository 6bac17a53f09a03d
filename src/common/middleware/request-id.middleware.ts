import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'node:crypto';

const REQUEST_ID_HEADER = 'x-request-id';
const MAX_REQUEST_ID_LENGTH = 128;

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const headerValue = req.header(REQUEST_ID_HEADER)?.trim();
  const requestId =
    headerValue && headerValue.length > 0 ? headerValue.slice(0, MAX_REQUEST_ID_LENGTH) : randomUUID();

  req.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);

  next();
}
