import { UnauthenticatedError } from '../common/errors';
import type { IdentityProvider } from '../backend/IdentityProvider';

export type SessionSnapshot = {
  userId: string | null;
  startedAt: Date | null;
  expiresAt: Date | null;
};

export type SessionListener = (snapshot: SessionSnapshot) => void;

export type SessionOptions = {
  /** Lifetime of a session in milliseconds; `null` keeps it until sign-out. */
  ttlMs?: number | null;
  now?: () => Date;
};

const SIGNED_OUT: SessionSnapshot = { userId: null, startedAt: null, expiresAt: null };

/**
 * Current user of this process. Injected wherever an operation needs to know
 * who is signed in.
 */
export class Session {
  private snapshot: SessionSnapshot = SIGNED_OUT;
  private readonly listeners = new Set<SessionListener>();
  private readonly ttlMs: number | null;
  private readonly now: () => Date;

  constructor(options: SessionOptions = {}) {
    this.ttlMs = options.ttlMs ?? null;
    this.now = options.now ?? (() => new Date());
  }

  get userId(): string | null {
    const { userId, expiresAt } = this.snapshot;
    if (!userId) return null;
    if (expiresAt && this.now().getTime() >= expiresAt.getTime()) {
      this.expire();
      return null;
    }
    return userId;
  }

  get isAuthenticated(): boolean {
    return this.userId !== null;
  }

  getSnapshot(): SessionSnapshot {
    return this.isAuthenticated ? this.snapshot : SIGNED_OUT;
  }

  requireUserId(): string {
    const userId = this.userId;
    if (!userId) {
      throw new UnauthenticatedError();
    }
    return userId;
  }

  start(userId: string) {
    const startedAt = this.now();
    const expiresAt = this.ttlMs === null ? null : new Date(startedAt.getTime() + this.ttlMs);
    this.snapshot = { userId, startedAt, expiresAt };
    console.log('[session] Started for user', userId);
    this.emit();
  }

  end() {
    if (this.snapshot.userId === null) return;
    this.snapshot = SIGNED_OUT;
    console.log('[session] Ended');
    this.emit();
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // Expiry is noticed on read; subscribers hear it as an ended session.
  private expire() {
    this.snapshot = SIGNED_OUT;
    console.log('[session] Expired');
    this.emit();
  }

  private emit() {
    const snapshot = this.getSnapshot();
    this.listeners.forEach((listener) => listener(snapshot));
  }
}

/**
 * Follows the provider's auth-state stream: a restored provider user starts
 * a session, a provider sign-out ends it.
 */
export function bindSessionToIdentity(session: Session, identity: IdentityProvider): () => void {
  return identity.onUserChanged((userId) => {
    if (userId === null) {
      session.end();
      return;
    }
    if (session.userId !== userId) {
      session.start(userId);
    }
  });
}
