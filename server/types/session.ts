import type { Session, SessionData } from 'express-session';
import type { UserRole } from '../../shared/constants/statuses';
import type { Principal } from '../../shared/models/users';

export interface SessionUser {
  id: number;
  role: UserRole;
  email?: string;
  name?: string;
}

declare module 'express-session' {
  interface SessionData {
    user?: SessionUser;
  }
}

export function getSessionUser(req: { session?: Session & Partial<SessionData> }): SessionUser | undefined {
  return req.session?.user;
}

export function toPrincipal(user: SessionUser): Principal {
  return { id: user.id, role: user.role };
}
