import type { Request, Response, NextFunction, RequestHandler } from "express";
import { SessionState } from "../session/state.js";
import type { SessionStore } from "../session/store.js";

export const SESSION_HEADER = "x-session-id";

/**
 * Attach the caller's session to res.locals. The (possibly new) id is echoed
 * back in X-Session-Id so the client can keep using it.
 */
export function sessionMiddleware(store: SessionStore): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const header = req.headers[SESSION_HEADER];
    const requested = typeof header === "string" && header.length > 0 ? header : undefined;
    const { session } = store.resolve(requested);
    res.locals.session = session;
    res.setHeader("X-Session-Id", session.id);
    next();
  };
}

export function getSession(res: Response): SessionState {
  const session: unknown = res.locals.session;
  if (!(session instanceof SessionState)) {
    throw new Error("Session middleware not mounted");
  }
  return session;
}
