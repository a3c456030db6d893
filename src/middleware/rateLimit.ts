// Rate limiting middleware
import rateLimit from 'express-rate-limit';

import { config } from '../config/index.js';

/**
 * Rate limiter: RATE_LIMIT_MAX_REQUESTS per RATE_LIMIT_WINDOW_MS (120/min by default)
 */
export const rateLimiter = rateLimit({
  windowMs: config.rateLimitWindowMs,
  max: config.rateLimitMaxRequests,
  message: 'Too many requests, please try again later',
  standardHeaders: true,
  legacyHeaders: false,
});
