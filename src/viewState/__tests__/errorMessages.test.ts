import {
  ForbiddenError,
  IdentityProviderError,
  InvalidInputError,
  OperationFailedError,
} from '../../services/common/errors';
import { formatProviderError, loginErrorMessage, postErrorMessage } from '../errorMessages';

describe('loginErrorMessage', () => {
  it('shows validation messages verbatim', () => {
    expect(loginErrorMessage(new InvalidInputError('Email cannot be empty.'), 'Sign-in')).toBe(
      'Email cannot be empty.',
    );
  });

  it.each([
    ['invalid-email', 'Invalid email address.'],
    ['wrong-password', 'Incorrect password.'],
    ['user-not-found', 'No account exists for this email.'],
    ['email-already-in-use', 'This email is already in use.'],
    ['weak-password', 'Password is too weak. Please use a stronger password.'],
    ['network-error', 'Network error. Please check your connection and try again.'],
  ] as const)('maps %s inside a wrapped failure', (code, message) => {
    const wrapped = new OperationFailedError('sign-in', new IdentityProviderError(code, 'raw'));

    expect(loginErrorMessage(wrapped, 'Sign-in')).toBe(message);
  });

  it('formats unmapped provider codes generically', () => {
    const error = new IdentityProviderError('too-many-requests', 'Try again later.');

    expect(formatProviderError(error)).toBe('Authentication error: Try again later.');
    expect(loginErrorMessage(error, 'Sign-up')).toBe('Authentication error: Try again later.');
  });

  it('falls back to the context for anything else', () => {
    expect(loginErrorMessage(new Error('boom'), 'Sign-in')).toBe('Sign-in failed: boom');
  });
});

describe('postErrorMessage', () => {
  it('names ownership failures', () => {
    expect(postErrorMessage(new ForbiddenError('nope'), 'updating post')).toBe(
      'You can only change your own posts.',
    );
  });

  it('uses the cause of wrapped failures', () => {
    const wrapped = new OperationFailedError('delete', new Error('permission-denied'));

    expect(postErrorMessage(wrapped, 'deleting post')).toBe(
      'Failed deleting post: permission-denied',
    );
  });
});
