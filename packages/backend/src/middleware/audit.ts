import { Request, Response, NextFunction } from 'express';

const AUDITED_METHODS = ['POST', 'PUT', 'PATCH', 'DELETE'];

/**
 * Audit logging middleware: one line per mutating request, written once
 * the response has gone out.
 */
export function auditLog(req: Request, res: Response, next: NextFunction) {
  if (!AUDITED_METHODS.includes(req.method)) {
    return next();
  }

  const startedAt = Date.now();
  const ip = req.ip || req.socket.remoteAddress;
  res.on('finish', () => {
    const timestamp = new Date().toISOString();
    const elapsed = Date.now() - startedAt;
    console.log(`[AUDIT] ${timestamp} - ${req.method} ${req.originalUrl} ${res.statusCode} ${elapsed}ms - IP: ${ip}`);
  });

  next();
}
