import { z } from 'zod';
import type { AuthRequest } from '../middleware/auth';
import type { ActorContext } from '../types/actor';
import { AppError } from './AppError';

export const dateOnlySchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');
export const moneySchema = z.number().nonnegative().multipleOf(0.01);

const idParamsSchema = z.object({ id: z.string().uuid() });

// Query strings carry booleans as text
export const booleanQuerySchema = z.enum(['true', 'false']).transform(value => value === 'true');

export function parseIdParam(req: AuthRequest): string {
  return idParamsSchema.parse(req.params).id;
}

/**
 * The authenticated caller as the services expect it
 */
export function getActor(req: AuthRequest): ActorContext {
  if (!req.user) {
    throw new AppError('Authentication required', 401, 'UNAUTHORIZED');
  }
  return { userId: req.user.id, role: req.user.role, ipAddress: req.ip };
}
