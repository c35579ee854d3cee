import { Response, NextFunction } from 'express';
import jwt, { JwtPayload } from 'jsonwebtoken';
import { pool } from '../connections/db/connection';
import { appConfig } from '../connections/config/app.config';
import { isUserRole, USER_STATUS, UserRole } from '../constants';
import { AuthRequest, AuthUser } from '../types/request.types';
import { ResponseHandler } from '../utils/response';

const readUserId = (decoded: string | JwtPayload): number | null => {
  if (typeof decoded === 'string') {
    return null;
  }

  const value: unknown = decoded.userId;
  const userId = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  return Number.isInteger(userId) && userId > 0 ? userId : null;
};

const resolveUserFromToken = async (token: string): Promise<AuthUser> => {
  const userId = readUserId(jwt.verify(token, appConfig.jwtSecret));

  if (userId === null) {
    throw new Error('Invalid token payload');
  }

  const result = await pool.query(
    'SELECT id, email, phone, role, status FROM users WHERE id = $1',
    [userId]
  );

  if (result.rows.length === 0) {
    throw new Error('User not found');
  }

  const user = result.rows[0];

  if (user.status !== USER_STATUS.ACTIVE) {
    throw new Error('Account is disabled');
  }

  const role: unknown = user.role;
  if (!isUserRole(role)) {
    throw new Error('Account has no valid role');
  }

  return {
    id: userId,
    role,
    ...(typeof user.email === 'string' ? { email: user.email } : {}),
    ...(typeof user.phone === 'string' ? { phone: user.phone } : {}),
  };
};

export const authenticate = async (
  req: AuthRequest,
  res: Response,
  next: NextFunction
) => {
  try {
    const token = req.headers.authorization?.split(' ')[1];

    if (!token) {
      return ResponseHandler.unauthorized(res, 'Token not provided');
    }

    req.user = await resolveUserFromToken(token);

    next();
  } catch (error) {
    return ResponseHandler.unauthorized(res, error instanceof Error && error.message ? error.message : 'Invalid token');
  }
};

export const requireRole = (...roles: UserRole[]) => {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    if (!req.user) {
      return ResponseHandler.unauthorized(res, 'Not authenticated');
    }

    if (!roles.includes(req.user.role)) {
      return ResponseHandler.forbidden(res, 'Access denied');
    }

    next();
  };
};
