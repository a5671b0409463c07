import { Request, Response, NextFunction } from "express";
import { randomUUID } from "crypto";

// Extend Express Request to carry the request id
declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

const REQUEST_ID_HEADER = "x-request-id";

/**
 * Assign a request id (reusing an inbound X-Request-Id when sane) and echo it back
 */
export function requestContext(req: Request, res: Response, next: NextFunction) {
  req.requestId = extractRequestId(req) ?? randomUUID();
  res.setHeader("X-Request-Id", req.requestId);
  next();
}

function extractRequestId(req: Request): string | null {
  const header = req.headers[REQUEST_ID_HEADER];
  if (typeof header === "string" && /^[A-Za-z0-9._-]{1,128}$/.test(header)) {
    return header;
  }
  return null;
}
