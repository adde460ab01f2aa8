import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';

// ---------------------------------------------------------------------------
// User payload shape, as issued by whatever service signs the dashboard's
// tokens. Declared here and re-used by requireAdmin.
// ---------------------------------------------------------------------------
export interface UserPayload {
  discordId: string;
  username: string;
  isAdmin: boolean;
}

// ---------------------------------------------------------------------------
// Augment Express's Request type so req.user is available in all route
// handlers without needing a cast.
// ---------------------------------------------------------------------------
declare global {
  namespace Express {
    interface Request {
      user?: UserPayload;
    }
  }
}

function isUserPayload(value: unknown): value is UserPayload {
  if (typeof value !== 'object' || value === null) return false;
  return (
    typeof Reflect.get(value, 'discordId') === 'string' &&
    typeof Reflect.get(value, 'username') === 'string' &&
    typeof Reflect.get(value, 'isAdmin') === 'boolean'
  );
}

/**
 * The token from `Authorization: Bearer <jwt>`, falling back to the
 * HttpOnly 'session' cookie the dashboard uses.
 */
function extractToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (header?.startsWith('Bearer ')) {
    const token = header.slice('Bearer '.length).trim();
    if (token) return token;
  }

  const cookie: unknown = req.cookies?.session;
  return typeof cookie === 'string' && cookie ? cookie : null;
}

// ---------------------------------------------------------------------------
// requireAuth
//
// Verifies the JWT and attaches the decoded payload to req.user. Returns 401
// if the token is missing or invalid (expired, tampered, wrong secret).
// JWT_SECRET is read per request so tests can set it after import.
// ---------------------------------------------------------------------------
export function requireAuth(req: Request, res: Response, next: NextFunction): void {
  const { JWT_SECRET } = process.env;

  if (!JWT_SECRET) {
    console.error('JWT_SECRET is not set; cannot verify tokens.');
    res.status(500).json({ error: 'Server misconfiguration.' });
    return;
  }

  const token = extractToken(req);

  if (!token) {
    res.status(401).json({ error: 'Not authenticated.' });
    return;
  }

  let payload: unknown;
  try {
    payload = jwt.verify(token, JWT_SECRET);
  } catch {
    // Token is expired, tampered with, or signed with the wrong secret.
    res.status(401).json({ error: 'Session expired or invalid. Please log in again.' });
    return;
  }

  if (!isUserPayload(payload)) {
    res.status(401).json({ error: 'Token payload is missing user fields.' });
    return;
  }

  req.user = payload;
  next();
}
