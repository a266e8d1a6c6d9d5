import { timingSafeEqual } from 'crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import type { AppConfig } from '../config';
import { AuthorizationError } from '../errors';
import { parseInput } from '../lib/validation';

export const SESSION_COOKIE = 'admin_session';
const SESSION_MAX_AGE_MS = 24 * 60 * 60 * 1000;

export const Capability = {
  Admin: 'admin',
} as const;

export type Capability = (typeof Capability)[keyof typeof Capability];

const loginSchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(1),
});

type AuthConfig = Pick<AppConfig, 'admin' | 'env'>;

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

/**
 * Reads the signed session cookie into `req.currentUser`. Requests without a
 * valid signature simply stay anonymous.
 */
export function loadCurrentUser(config: AuthConfig): RequestHandler {
  return (req, _res, next) => {
    const email: unknown = req.signedCookies?.[SESSION_COOKIE];
    if (typeof email === 'string' && email.length > 0) {
      req.currentUser = {
        email,
        isAdmin: safeEqual(email.toLowerCase(), config.admin.email.toLowerCase()),
      };
    }
    next();
  };
}

/** Guards a route behind a capability; failures go to the error handler. */
export function requireCapability(capability: Capability): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const user = req.currentUser;
    if (!user) {
      next(new AuthorizationError('Authentication required', 401));
      return;
    }
    if (capability === Capability.Admin && !user.isAdmin) {
      next(new AuthorizationError('Administrator access required', 403));
      return;
    }
    next();
  };
}

// POST /admin/login
export function createLoginHandler(config: AuthConfig): RequestHandler {
  return (req, res, next) => {
    try {
      const { email, password } = parseInput(loginSchema, req.body);
      const valid =
        safeEqual(email.toLowerCase(), config.admin.email.toLowerCase()) &&
        safeEqual(password, config.admin.password);

      if (!valid) {
        console.warn(`Failed admin login for ${email}`);
        throw new AuthorizationError('Invalid credentials', 401);
      }

      res.cookie(SESSION_COOKIE, email.toLowerCase(), {
        httpOnly: true,
        signed: true,
        sameSite: 'lax',
        secure: config.env === 'production',
        maxAge: SESSION_MAX_AGE_MS,
      });
      res.json({ success: true, user: { email: email.toLowerCase(), isAdmin: true } });
    } catch (error) {
      next(error);
    }
  };
}

// POST /admin/logout
export const logoutAdmin: RequestHandler = (_req, res) => {
  res.clearCookie(SESSION_COOKIE);
  res.json({ success: true });
};
