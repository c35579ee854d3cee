import { Request } from 'express';
import type { Actor } from '../modules/orders/orders.types';

/**
 * Request Types and Interfaces
 */

/**
 * Authenticated user attached by the auth middleware
 */
export interface AuthUser extends Actor {
  email?: string;
  phone?: string;
}

/**
 * Auth Request - Request carrying the authenticated user
 */
export interface AuthRequest extends Request {
  user?: AuthUser;
}

