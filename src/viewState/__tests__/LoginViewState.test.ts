import { InMemoryDocumentStore } from '../../services/backend/memory/InMemoryDocumentStore';
import { InMemoryIdentityProvider } from '../../services/backend/memory/InMemoryIdentityProvider';
import { UserUseCase } from '../../services/domain/users/UserUseCase';
import { StoreUserRepository } from '../../services/repositories/users/StoreUserRepository';
import { Session } from '../../services/session/Session';
import { LoginViewState } from '../LoginViewState';

const loginAt = new Date('2025-03-22T10:00:00.000Z');

function buildHarness() {
  const identity = new InMemoryIdentityProvider();
  const store = new InMemoryDocumentStore();
  const session = new Session();
  const useCase = new UserUseCase(new StoreUserRepository(identity, store), session, () => loginAt);
  const viewState = new LoginViewState(useCase, session);
  return { identity, store, session, useCase, viewState };
}

describe('LoginViewState', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('starts idle with empty fields', () => {
    const { viewState } = buildHarness();

    expect(viewState.getSnapshot()).toEqual({
      email: '',
      password: '',
      phase: 'idle',
      isAuthenticated: false,
      profile: null,
      isLoading: false,
      errorMessage: null,
    });
  });

  it('signs up, starts the session and clears the password', async () => {
    const { session, viewState } = buildHarness();
    viewState.setEmail('reader@example.com');
    viewState.setPassword('secret1');

    await viewState.signUp();

    expect(viewState.getSnapshot()).toMatchObject({
      phase: 'authenticated',
      isAuthenticated: true,
      isLoading: false,
      errorMessage: null,
      password: '',
      profile: { id: 'user-1', email: 'reader@example.com', lastLogin: loginAt },
    });
    expect(session.userId).toBe('user-1');
  });

  it('shows validation messages and stays idle', async () => {
    const { identity, viewState } = buildHarness();
    const signIn = jest.spyOn(identity, 'signIn');
    viewState.setEmail('reader@example.com');
    viewState.setPassword('123');

    await viewState.signIn();

    expect(viewState.getSnapshot()).toMatchObject({
      phase: 'idle',
      isAuthenticated: false,
      isLoading: false,
      errorMessage: 'Password must be at least 6 characters long.',
    });
    expect(signIn).not.toHaveBeenCalled();
  });

  it('maps provider codes to friendly messages', async () => {
    const { viewState } = buildHarness();
    viewState.setEmail('nobody@example.com');
    viewState.setPassword('secret1');

    await viewState.signIn();

    expect(viewState.getSnapshot().errorMessage).toBe('No account exists for this email.');
  });

  it('falls back to a context message for other failures', async () => {
    const { store, viewState } = buildHarness();
    jest.spyOn(store, 'set').mockRejectedValueOnce(new Error('quota exceeded'));
    viewState.setEmail('reader@example.com');
    viewState.setPassword('secret1');

    await viewState.signUp();

    expect(viewState.getSnapshot().errorMessage).toBe('Sign-up failed: quota exceeded');
    expect(viewState.getSnapshot().phase).toBe('idle');
  });

  it('clears the previous error when a new attempt starts', async () => {
    const { viewState } = buildHarness();
    await viewState.signIn();
    expect(viewState.getSnapshot().errorMessage).toBe('Email cannot be empty.');

    const seen: Array<[boolean, string | null]> = [];
    viewState.subscribe((snapshot) => seen.push([snapshot.isLoading, snapshot.errorMessage]));
    viewState.setEmail('reader@example.com');
    viewState.setPassword('secret1');
    await viewState.signUp();

    expect(seen).toContainEqual([true, null]);
    expect(viewState.getSnapshot().errorMessage).toBeNull();
  });

  it('ignores a second submit while one is in flight', async () => {
    const { useCase, viewState } = buildHarness();
    const signUp = jest.spyOn(useCase, 'signUp');
    viewState.setEmail('reader@example.com');
    viewState.setPassword('secret1');

    const first = viewState.signUp();
    const second = viewState.signUp();
    await Promise.all([first, second]);

    expect(signUp).toHaveBeenCalledTimes(1);
  });

  it('resets back to idle', async () => {
    const { viewState } = buildHarness();
    viewState.setEmail('reader@example.com');
    viewState.setPassword('secret1');
    await viewState.signUp();

    viewState.reset();

    expect(viewState.getSnapshot()).toMatchObject({
      phase: 'idle',
      isAuthenticated: false,
      profile: null,
      errorMessage: null,
    });
  });

  it('returns to idle when the session ends and accepts the next sign-in', async () => {
    const { session, useCase, viewState } = buildHarness();
    viewState.setEmail('reader@example.com');
    viewState.setPassword('secret1');
    await viewState.signUp();

    session.end();

    expect(viewState.getSnapshot()).toMatchObject({
      phase: 'idle',
      isAuthenticated: false,
      profile: null,
    });

    const signIn = jest.spyOn(useCase, 'signIn');
    viewState.setPassword('secret1');
    await viewState.signIn();

    expect(signIn).toHaveBeenCalledWith('reader@example.com', 'secret1');
    expect(viewState.getSnapshot()).toMatchObject({ phase: 'authenticated', isAuthenticated: true });
    expect(session.userId).toBe('user-1');
  });

  it('stops following the session once disposed', async () => {
    const { session, viewState } = buildHarness();
    viewState.setEmail('reader@example.com');
    viewState.setPassword('secret1');
    await viewState.signUp();

    viewState.dispose();
    session.end();

    expect(viewState.getSnapshot().phase).toBe('authenticated');
  });
});
