import type { CurrentUser } from './blog';

declare global {
  namespace Express {
    interface Request {
      /** Set by the session middleware when a valid session cookie is present. */
      currentUser?: CurrentUser;
    }
  }
}

export {};
