import type { NextFunction, Request, Response } from 'express';

export type LimitDecision =
  | { allowed: true }
  | { allowed: false; retryAfterSeconds: number };

interface ClientWindow {
  count: number;
  resetTime: number;
}

/**
 * Fixed-window counter per client, one process only. Windows that have run
 * out are pruned once per window length.
 */
export class FixedWindowLimiter {
  private readonly windows = new Map<string, ClientWindow>();
  private lastPrune: number;

  constructor(
    private readonly maxRequests: number,
    private readonly windowMs: number,
    private readonly now: () => number = Date.now,
  ) {
    this.lastPrune = now();
  }

  hit(clientId: string): LimitDecision {
    const now = this.now();
    if (now - this.lastPrune >= this.windowMs) {
      this.prune(now);
    }

    const current = this.windows.get(clientId);
    if (!current || now > current.resetTime) {
      this.windows.set(clientId, { count: 1, resetTime: now + this.windowMs });
      return { allowed: true };
    }

    if (current.count >= this.maxRequests) {
      return { allowed: false, retryAfterSeconds: Math.ceil((current.resetTime - now) / 1000) };
    }

    current.count++;
    return { allowed: true };
  }

  /** Clients with a window still held in memory. */
  get trackedClients(): number {
    return this.windows.size;
  }

  private prune(now: number): void {
    for (const [clientId, window] of this.windows) {
      if (now > window.resetTime) {
        this.windows.delete(clientId);
      }
    }
    this.lastPrune = now;
  }
}

export function rateLimit(maxRequests: number = 100, windowMs: number = 15 * 60 * 1000) {
  const limiter = new FixedWindowLimiter(maxRequests, windowMs);

  return (req: Request, res: Response, next: NextFunction): void => {
    const decision = limiter.hit(req.ip || 'unknown');
    if (decision.allowed) {
      next();
      return;
    }

    res.status(429).json({
      error: {
        message: 'Too many requests',
        status: 429,
        retryAfter: decision.retryAfterSeconds,
      },
    });
  };
}
