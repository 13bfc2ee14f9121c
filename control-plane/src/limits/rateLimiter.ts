import type { NextFunction, Request, Response } from "express";

type Window = {
  count: number;
  resetAt: number;
};

/**
 * Fixed one-minute window per client address. Runners posting node updates
 * share the budget with polling clients, so the default is generous.
 */
export function createRateLimiter(limitPerMinute: number, clock: () => number = () => Date.now()) {
  const windows = new Map<string, Window>();
  const windowMs = 60_000;

  return (request: Request, response: Response, next: NextFunction): void => {
    const key = request.ip ?? request.socket.remoteAddress ?? "anonymous";
    const now = clock();
    const current = windows.get(key);

    if (!current || now >= current.resetAt) {
      windows.set(key, { count: 1, resetAt: now + windowMs });
      next();
      return;
    }

    if (current.count >= limitPerMinute) {
      response.setHeader("Retry-After", String(Math.ceil((current.resetAt - now) / 1000)));
      response.status(429).json({ error: "rate_limited", message: "Rate limit exceeded." });
      return;
    }

    current.count += 1;
    next();
  };
}
