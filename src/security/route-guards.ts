import crypto from 'crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { env } from '../env.js';
import { AppError, formatErrorResponse } from '../utils/errors.js';

interface RateBucket {
  count: number;
  resetAt: number;
}

function getHeaderValue(header: string | string[] | undefined): string {
  if (Array.isArray(header)) {
    return header[0] ?? '';
  }
  return String(header ?? '');
}

function extractBearerToken(authorizationHeader: string): string {
  if (!authorizationHeader) return '';
  const [scheme, token, ...rest] = authorizationHeader.split(' ');
  if (!scheme || !token || rest.length > 0) return '';
  if (!/^Bearer$/i.test(scheme)) return '';
  return token.trim();
}

function stableTokenHash(rawToken: string): string {
  return crypto.createHash('sha256').update(rawToken).digest('hex').slice(0, 16);
}

export function extractAuthToken(request: FastifyRequest): string {
  const xApiToken = getHeaderValue(request.headers['x-api-token']).trim();
  if (xApiToken) return xApiToken;

  return extractBearerToken(getHeaderValue(request.headers.authorization));
}

export function requireAuthIfEnabled(request: FastifyRequest, reply: FastifyReply): boolean {
  if (!env.AUTH_ENFORCEMENT_ENABLED) return true;

  if (extractAuthToken(request)) return true;

  const error = AppError.unauthorized('Missing API token');
  reply.code(error.statusCode).send(formatErrorResponse(error));
  return false;
}

const TRUSTED_PROXY_RANGES = [
  // Private IP ranges (RFC 1918)
  /^10\./,
  /^172\.(1[6-9]|2[0-9]|3[0-1])\./,
  /^192\.168\./,
  // Localhost
  /^127\./,
  /^::1$/,
];

export function isTrustedProxy(ip: string): boolean {
  return TRUSTED_PROXY_RANGES.some(range => range.test(ip));
}

export function getRealClientIP(request: FastifyRequest): string {
  const clientIP = request.ip;
  if (!isTrustedProxy(clientIP)) {
    return clientIP;
  }

  const forwarded = request.headers['x-forwarded-for'];
  if (forwarded && typeof forwarded === 'string') {
    // X-Forwarded-For: client, proxy1, proxy2; the rightmost untrusted hop is the client
    const ips = forwarded.split(',').map(ip => ip.trim());
    for (let i = ips.length - 1; i >= 0; i--) {
      const ip = ips[i];
      if (ip && !isTrustedProxy(ip)) {
        return ip;
      }
    }
    return ips[0] || clientIP;
  }

  const realIP = request.headers['x-real-ip'];
  if (realIP && typeof realIP === 'string') {
    return realIP;
  }

  return clientIP;
}

export interface RateLimiterOptions {
  windowMs: () => number;
  maxRequests: () => number;
  now?: () => number;
}

/**
 * Fixed-window counter per route and client. Clients are keyed by a hash of
 * their API token when they send one, otherwise by IP.
 */
export class RateLimiter {
  private readonly buckets = new Map<string, RateBucket>();
  private readonly now: () => number;

  constructor(private readonly options: RateLimiterOptions) {
    this.now = options.now ?? Date.now;
  }

  /** Counts one request; returns the seconds to wait when the window is exhausted. */
  hit(key: string): number | null {
    const now = this.now();
    this.cleanupExpired(now);

    const current = this.buckets.get(key);
    if (!current || current.resetAt <= now) {
      this.buckets.set(key, { count: 1, resetAt: now + this.options.windowMs() });
      return null;
    }

    if (current.count >= this.options.maxRequests()) {
      return Math.max(1, Math.ceil((current.resetAt - now) / 1000));
    }

    current.count += 1;
    return null;
  }

  reset(): void {
    this.buckets.clear();
  }

  private cleanupExpired(now: number): void {
    if (this.buckets.size < 5000) return;
    for (const [key, bucket] of this.buckets) {
      if (bucket.resetAt <= now) {
        this.buckets.delete(key);
      }
    }
  }
}

export const turnRateLimiter = new RateLimiter({
  windowMs: () => env.RATE_LIMIT_WINDOW_MS,
  maxRequests: () => env.RATE_LIMIT_TURNS_PER_WINDOW,
});

export function enforceRateLimitIfEnabled(
  request: FastifyRequest,
  reply: FastifyReply,
  routeKey: string,
  limiter: RateLimiter = turnRateLimiter,
): boolean {
  if (!env.RATE_LIMITING_ENABLED) return true;

  const token = extractAuthToken(request);
  const clientKey = token
    ? `token:${stableTokenHash(token)}`
    : `ip:${getRealClientIP(request)}`;

  const retryAfterSeconds = limiter.hit(`${routeKey}:${clientKey}`);
  if (retryAfterSeconds === null) return true;

  const error = AppError.rateLimited(retryAfterSeconds, 'Too many requests. Please try again later.');
  reply.header('Retry-After', String(retryAfterSeconds));
  reply.code(error.statusCode).send(formatErrorResponse(error));
  return false;
}
