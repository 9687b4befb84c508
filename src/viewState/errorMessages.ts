import {
  ForbiddenError,
  IdentityProviderError,
  InvalidContentError,
  InvalidInputError,
  InvalidPostIdError,
  InvalidTitleError,
  OperationFailedError,
  PostNotFoundError,
  UnauthenticatedError,
  describeCause,
  type IdentityProviderErrorCode,
} from '../services/common/errors';

export type LoginContext = 'Sign-in' | 'Sign-up';

export type PostContext =
  | 'loading posts'
  | 'creating post'
  | 'updating post'
  | 'deleting post'
  | 'signing out';

const PROVIDER_MESSAGES: Partial<Record<IdentityProviderErrorCode, string>> = {
  'invalid-email': 'Invalid email address.',
  'wrong-password': 'Incorrect password.',
  'user-not-found': 'No account exists for this email.',
  'email-already-in-use': 'This email is already in use.',
  'weak-password': 'Password is too weak. Please use a stronger password.',
  'network-error': 'Network error. Please check your connection and try again.',
};

function findProviderError(error: unknown): IdentityProviderError | null {
  if (error instanceof IdentityProviderError) return error;
  if (error instanceof OperationFailedError && error.cause instanceof IdentityProviderError) {
    return error.cause;
  }
  return null;
}

function describeFailure(error: unknown): string {
  if (error instanceof OperationFailedError) {
    return describeCause(error.cause);
  }
  return describeCause(error);
}

export function formatProviderError(error: IdentityProviderError): string {
  return PROVIDER_MESSAGES[error.providerCode] ?? `Authentication error: ${error.message}`;
}

export function loginErrorMessage(error: unknown, context: LoginContext): string {
  if (error instanceof InvalidInputError) {
    return error.message;
  }

  const providerError = findProviderError(error);
  if (providerError) {
    return formatProviderError(providerError);
  }

  return `${context} failed: ${describeFailure(error)}`;
}

export function postErrorMessage(error: unknown, context: PostContext): string {
  if (error instanceof InvalidTitleError) return 'Title cannot be empty.';
  if (error instanceof InvalidContentError) return 'Content cannot be empty.';
  if (error instanceof UnauthenticatedError) return `You must be signed in before ${context}.`;
  if (error instanceof InvalidPostIdError) return 'Invalid post ID.';
  if (error instanceof PostNotFoundError) return 'Post not found.';
  if (error instanceof ForbiddenError) return 'You can only change your own posts.';

  return `Failed ${context}: ${describeFailure(error)}`;
}
