import { Request, Response, NextFunction } from 'express';
import { HttpError } from './errorHandler';

// ---------------------------------------------------------------------------
// requireAdmin
//
// Guards the routes that end playback for everyone in a guild (stop, leave).
// Mounted after requireAuth, which sets req.user. The admin flag comes from
// the token, so a role change applies from the next token issued.
// ---------------------------------------------------------------------------
export function requireAdmin(req: Request, _res: Response, next: NextFunction): void {
  const user = req.user;

  if (!user) {
    next(new HttpError(500, 'requireAdmin used without requireAuth.'));
    return;
  }

  if (!user.isAdmin) {
    console.warn(`[Auth] ${user.username} (${user.discordId}) tried ${req.method} ${req.originalUrl} without admin.`);
    next(new HttpError(403, 'Admin access required.', 'Forbidden'));
    return;
  }

  next();
}
