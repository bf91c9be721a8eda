import type { Request, Response, NextFunction } from 'express';

type RequestLogEntry = {
  event: 'http_request';
  requestId?: string;
  method: string;
  path: string;
  status: number;
  durationMs: number;
  tenantId?: string;
  userId?: string;
  errorCode?: string;
  timestamp: string;
};

export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();

  res.on('finish', () => {
    const entry: RequestLogEntry = {
      event: 'http_request',
      requestId: req.requestId,
      method: req.method,
      path: req.path,
      status: res.statusCode,
      durationMs: Date.now() - start,
      tenantId: req.auth?.tenantId,
      userId: req.auth?.userId,
      errorCode: typeof res.locals.errorCode === 'string' ? res.locals.errorCode : undefined,
      timestamp: new Date().toISOString()
    };

    if (res.statusCode >= 500) {
      console.error(JSON.stringify(entry));
    } else {
      console.log(JSON.stringify(entry));
    }
  });

  next();
}
