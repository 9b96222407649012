import { NextFunction, Request, Response } from 'express';
import { JWTPayload, verifyToken } from '../utils/jwt';
import { sendResponse } from '../utils/response';

export interface AuthRequest extends Request {
  user?: JWTPayload;
}

export function authMiddleware(req: AuthRequest, res: Response, next: NextFunction) {
  const authHeader = req.headers["authorization"];
  if (!authHeader || !authHeader.startsWith("Bearer ")) {
    return sendResponse(res, 401, "No token provided", { code: "UNAUTHORIZED" });
  }

  const token = authHeader.split(" ")[1];

  try {
    req.user = verifyToken(token);
  } catch (err) {
    console.warn('🔒 [authMiddleware] Rejected token:', err instanceof Error ? err.message : err);
    return sendResponse(res, 401, "Invalid or expired token", { code: "UNAUTHORIZED" });
  }
  next();
}
