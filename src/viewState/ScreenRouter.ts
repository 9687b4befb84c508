import type { Session, SessionSnapshot } from '../services/session/Session';
import { ViewStateStore } from './ViewStateStore';

export type Screen = 'login' | 'posts';

export type RouterState = {
  screen: Screen;
};

export function resolveScreen(session: Pick<Session, 'isAuthenticated'>): Screen {
  return session.isAuthenticated ? 'posts' : 'login';
}

/** Top-level screen choice, recomputed on every session change. */
export class ScreenRouter extends ViewStateStore<RouterState> {
  private readonly unsubscribe: () => void;

  constructor(private readonly session: Session) {
    super({ screen: resolveScreen(session) });
    this.unsubscribe = session.subscribe((snapshot: SessionSnapshot) => {
      this.setState({ screen: snapshot.userId ? 'posts' : 'login' });
    });
  }

  /** Re-evaluates the session, picking up an expiry that happened silently. */
  refresh() {
    const screen = resolveScreen(this.session);
    if (screen !== this.getSnapshot().screen) {
      this.setState({ screen });
    }
  }

  dispose() {
    this.unsubscribe();
  }
}
