// Authentication middleware
import type { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';

import { config } from '../config/index.js';
import { normalizeAddress } from '../utils/Address.js';

export interface AuthRequest extends Request {
  user?: {
    address: string;
  };
}

/**
 * Authenticate via API key (read access) or JWT Bearer token (acts as the
 * token's `address` claim)
 */
export function authenticate(req: AuthRequest, res: Response, next: NextFunction) {
  // Check for API key in header
  const apiKey = req.header('x-api-key');
  if (apiKey === config.apiKey) {
    return next();
  }

  // Check for JWT Bearer token
  const authHeader = req.header('Authorization');
  if (authHeader && authHeader.startsWith('Bearer ')) {
    const token = authHeader.substring(7);
    try {
      const decoded = jwt.verify(token, config.jwtSecret);
      if (typeof decoded === 'string' || typeof decoded.address !== 'string' || decoded.address.trim() === '') {
        return res.status(401).json({ error: 'Token has no address claim' });
      }
      req.user = { address: normalizeAddress(decoded.address) };
      return next();
    } catch {
      return res.status(401).json({ error: 'Invalid token' });
    }
  }

  return res.status(401).json({ error: 'Authentication required' });
}

/**
 * Mutating routes act on behalf of a caller, so they need a JWT identity
 */
export function requireCaller(req: AuthRequest, res: Response, next: NextFunction) {
  if (!req.user) {
    return res.status(403).json({ error: 'A bearer token identifying the caller is required' });
  }
  return next();
}

/** Issue a caller token; used by operators and tests. */
export function signCallerToken(address: string, expiresInSec = 3600): string {
  return jwt.sign({ address }, config.jwtSecret, { expiresIn: expiresInSec });
}
