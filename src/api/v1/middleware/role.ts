import { Response, NextFunction } from 'express';
import type { AuthRequest } from './auth';
import { sendResponse } from '../utils/response';

export const USER_ROLES = ['pharmacist', 'manager', 'admin'] as const;
export type UserRole = (typeof USER_ROLES)[number];

// Middleware to check if user has required role
export const checkRole = (roles: UserRole[]) => {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    if (!req.user) {
      return sendResponse(res, 401, 'Authentication required', { code: 'UNAUTHORIZED' });
    }

    if (!roles.includes(req.user.role)) {
      return sendResponse(res, 403, 'Access denied. Insufficient permissions', { code: 'FORBIDDEN' });
    }

    next();
  };
};

// Specific role middlewares for convenience
export const isStaff = checkRole(['pharmacist', 'manager', 'admin']);
export const isManager = checkRole(['manager', 'admin']);
export const isAdmin = checkRole(['admin']);
