import { Session } from '../../services/session/Session';
import { ScreenRouter, resolveScreen } from '../ScreenRouter';

describe('ScreenRouter', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('switches screens with the session', () => {
    const session = new Session();
    const router = new ScreenRouter(session);
    const screens: string[] = [];
    router.subscribe((snapshot) => screens.push(snapshot.screen));

    expect(router.getSnapshot().screen).toBe('login');
    session.start('user-1');
    session.end();

    expect(screens).toEqual(['posts', 'login']);
    router.dispose();
  });

  it('stops following the session once disposed', () => {
    const session = new Session();
    const router = new ScreenRouter(session);

    router.dispose();
    session.start('user-1');

    expect(router.getSnapshot().screen).toBe('login');
  });

  it('picks up silent expiry on refresh', () => {
    let current = new Date('2025-03-22T10:00:00.000Z');
    const session = new Session({ ttlMs: 1_000, now: () => current });
    const router = new ScreenRouter(session);
    session.start('user-1');
    expect(router.getSnapshot().screen).toBe('posts');

    current = new Date('2025-03-22T10:00:05.000Z');
    router.refresh();

    expect(router.getSnapshot().screen).toBe('login');
    expect(resolveScreen(session)).toBe('login');
    router.dispose();
  });
});
