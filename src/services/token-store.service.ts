import type { Session } from '../types/session.types.js';

const UNAUTHENTICATED: Session = { status: 'unauthenticated' };

/**
 * Token Store
 *
 * Holds the process session in memory. The value is always replaced as a
 * whole, so a reader gets either the previous or the next session.
 * Only SessionManager writes to it.
 */
export class TokenStore {
  private session: Session = UNAUTHENTICATED;

  get(): Session {
    return this.session;
  }

  set(session: Session): void {
    this.session = session;
  }

  clear(): void {
    this.session = UNAUTHENTICATED;
  }
}
