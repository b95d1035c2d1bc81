import { Request, Response, NextFunction, RequestHandler } from 'express';
import helmet from 'helmet';
import { createHash, timingSafeEqual } from 'crypto';

export const UPLOAD_SECRET_HEADER = 'x-upload-secret';

/**
 * Security headers for the API routes, which only serve JSON and attachments.
 * Swagger UI is mounted ahead of this middleware.
 */
export const securityHeaders = (production: boolean): RequestHandler => helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"]
    }
  },
  crossOriginResourcePolicy: { policy: 'same-origin' },
  referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
  strictTransportSecurity: production
    ? { maxAge: 31536000, includeSubDomains: true, preload: true }
    : false
});

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * Rejects uploads that do not carry the shared upload secret. A server
 * without a configured secret accepts every upload.
 */
export const requireUploadSecret = (secret: string | undefined): RequestHandler => {
  if (!secret) {
    return (_req: Request, _res: Response, next: NextFunction) => next();
  }

  const expected = digest(secret);

  return (req: Request, res: Response, next: NextFunction) => {
    const provided = req.get(UPLOAD_SECRET_HEADER);
    // timingSafeEqual needs equal lengths, so compare digests
    if (!provided || !timingSafeEqual(digest(provided), expected)) {
      res.status(401).json({ error: 'Invalid or missing upload secret' });
      return;
    }
    next();
  };
};
