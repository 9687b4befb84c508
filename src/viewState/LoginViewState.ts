import type { UserProfile } from '../models/user';
import type { UserUseCase } from '../services/domain/users/UserUseCase';
import type { Session } from '../services/session/Session';
import { loginErrorMessage, type LoginContext } from './errorMessages';
import { ViewStateStore } from './ViewStateStore';

export type LoginPhase = 'idle' | 'submitting' | 'authenticated';

export type LoginState = {
  email: string;
  password: string;
  phase: LoginPhase;
  isAuthenticated: boolean;
  profile: UserProfile | null;
};

const INITIAL_STATE: LoginState = {
  email: '',
  password: '',
  phase: 'idle',
  isAuthenticated: false,
  profile: null,
};

/**
 * Login screen state: idle, submitting, then authenticated or back to idle
 * with an error message.
 */
export class LoginViewState extends ViewStateStore<LoginState> {
  private readonly unsubscribe: () => void;

  constructor(
    private readonly useCase: UserUseCase,
    private readonly session: Session,
  ) {
    super(INITIAL_STATE);
    // A session ended elsewhere (post screen, provider) returns the form to idle.
    this.unsubscribe = session.subscribe((snapshot) => {
      if (snapshot.userId === null && this.getSnapshot().phase === 'authenticated') {
        this.reset();
      }
    });
  }

  setEmail(email: string) {
    this.setState({ email });
  }

  setPassword(password: string) {
    this.setState({ password });
  }

  async signIn(): Promise<void> {
    await this.submit('Sign-in', (email, password) => this.useCase.signIn(email, password));
  }

  async signUp(): Promise<void> {
    await this.submit('Sign-up', (email, password) => this.useCase.signUp(email, password));
  }

  reset() {
    this.setState({ phase: 'idle', isAuthenticated: false, profile: null });
    this.setStatus({ errorMessage: null });
  }

  dispose() {
    this.unsubscribe();
  }

  private async submit(
    context: LoginContext,
    run: (email: string, password: string) => Promise<UserProfile>,
  ): Promise<void> {
    const { phase, email, password } = this.getSnapshot();
    if (phase === 'submitting') return;

    this.setState({ phase: 'submitting' });
    try {
      const profile = await this.withLoading(() => run(email, password));
      this.handleSuccess(profile);
    } catch (error) {
      this.handleError(error, context);
    }
  }

  private handleSuccess(profile: UserProfile) {
    if (profile.id && this.session.userId !== profile.id) {
      this.session.start(profile.id);
    }
    console.log('[auth] Authenticated user:', profile.email);
    this.setState({ phase: 'authenticated', isAuthenticated: true, profile, password: '' });
  }

  private handleError(error: unknown, context: LoginContext) {
    console.error(`[auth] ${context} error:`, error);
    this.setState({ phase: 'idle', isAuthenticated: false });
    this.setStatus({ errorMessage: loginErrorMessage(error, context) });
  }
}
