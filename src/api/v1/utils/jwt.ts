import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { JWT_EXPIRES_IN_SECONDS, JWT_SECRET } from '../config/env';
import { USER_ROLES } from '../middleware/role';

// Tokens are issued by the identity service; this API only needs the claims below
const jwtPayloadSchema = z.object({
  id: z.string().uuid(),
  username: z.string().min(1),
  role: z.enum(USER_ROLES),
});

export type JWTPayload = z.infer<typeof jwtPayloadSchema>;

export const generateToken = (payload: JWTPayload): string => {
  return jwt.sign(payload, JWT_SECRET, { expiresIn: JWT_EXPIRES_IN_SECONDS });
};

export const verifyToken = (token: string): JWTPayload => {
  return jwtPayloadSchema.parse(jwt.verify(token, JWT_SECRET));
};
