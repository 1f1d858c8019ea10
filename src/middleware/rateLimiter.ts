import rateLimit from 'express-rate-limit';
import { logger } from '../utils/logger';

/**
 * General API rate limiter
 * Peers gossip through the same API, so the window is generous
 */
export const apiLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  limit: 600,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res) => {
    logger.warn(`Rate limit exceeded for IP: ${req.ip} on path: ${req.path}`);
    res.status(429).json({
      error: 'Too many requests from this IP, please try again later.',
      retryAfter: '1 minute',
    });
  },
});

/**
 * Discovery scan rate limiter
 * A scan dials every address of every local subnet
 */
export const scanLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  limit: 5,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res) => {
    logger.warn(`Scan rate limit exceeded for IP: ${req.ip}`);
    res.status(429).json({
      error: 'Too many scan requests. Network scanning is resource-intensive.',
      retryAfter: '1 minute',
      hint: 'Use GET /api/hosts to retrieve the current roster instead',
    });
  },
});

/**
 * Backup/restore limiter
 * Restores swap the live database file
 */
export const backupLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  limit: 20,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res) => {
    logger.warn(`Backup rate limit exceeded for IP: ${req.ip}`);
    res.status(429).json({
      error: 'Too many backup requests. Please wait before trying again.',
      retryAfter: '1 minute',
    });
  },
});
