export type OperationTag =
  | 'sign-in'
  | 'sign-up'
  | 'sign-out'
  | 'profile-save'
  | 'profile-fetch'
  | 'fetch'
  | 'create'
  | 'update'
  | 'delete';

export type IdentityProviderErrorCode =
  | 'invalid-email'
  | 'wrong-password'
  | 'user-not-found'
  | 'email-already-in-use'
  | 'weak-password'
  | 'network-error'
  | 'invalid-credential'
  | 'too-many-requests'
  | 'unknown';

export class InvalidInputError extends Error {
  readonly code = 'invalid_input' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export class UnauthenticatedError extends Error {
  readonly code = 'unauthenticated' as const;

  constructor(message = 'User must be authenticated to perform this action.') {
    super(message);
    this.name = 'UnauthenticatedError';
  }
}

export class InvalidPostIdError extends Error {
  readonly code = 'invalid_post_id' as const;

  constructor() {
    super('Post ID is invalid or missing.');
    this.name = 'InvalidPostIdError';
  }
}

export class InvalidTitleError extends Error {
  readonly code = 'invalid_title' as const;

  constructor() {
    super('Post title cannot be empty.');
    this.name = 'InvalidTitleError';
  }
}

export class InvalidContentError extends Error {
  readonly code = 'invalid_content' as const;

  constructor() {
    super('Post content cannot be empty.');
    this.name = 'InvalidContentError';
  }
}

export class InvalidProfileError extends Error {
  readonly code = 'invalid_profile' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidProfileError';
  }
}

export class PostNotFoundError extends Error {
  readonly code = 'post_not_found' as const;

  constructor(readonly postId: string) {
    super(`Post ${postId} does not exist.`);
    this.name = 'PostNotFoundError';
  }
}

export class ForbiddenError extends Error {
  readonly code = 'forbidden' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ForbiddenError';
  }
}

/**
 * Normalized failure from the identity provider. `providerCode` keeps the
 * backend's own code (for Firebase, e.g. `auth/wrong-password`).
 */
export class IdentityProviderError extends Error {
  readonly code = 'identity_provider' as const;

  constructor(
    readonly providerCode: IdentityProviderErrorCode,
    message: string,
    readonly rawCode: string | null = null,
  ) {
    super(message);
    this.name = 'IdentityProviderError';
  }
}

const OPERATION_LABELS: Record<OperationTag, string> = {
  'sign-in': 'Sign-in failed',
  'sign-up': 'Sign-up failed',
  'sign-out': 'Failed to sign out',
  'profile-save': 'Failed to save user profile',
  'profile-fetch': 'Failed to fetch user profile',
  fetch: 'Failed to fetch posts',
  create: 'Failed to create post',
  update: 'Failed to update post',
  delete: 'Failed to delete post',
};

/**
 * Backend failure wrapped once at the use-case boundary. The original error
 * is kept on `cause`.
 */
export class OperationFailedError extends Error {
  readonly code = 'operation_failed' as const;

  constructor(
    readonly operation: OperationTag,
    cause: unknown,
  ) {
    super(`${OPERATION_LABELS[operation]}: ${describeCause(cause)}`, { cause });
    this.name = 'OperationFailedError';
  }
}

export type AppError =
  | InvalidInputError
  | UnauthenticatedError
  | InvalidPostIdError
  | InvalidTitleError
  | InvalidContentError
  | InvalidProfileError
  | PostNotFoundError
  | ForbiddenError
  | IdentityProviderError
  | OperationFailedError;

export function isAppError(error: unknown): error is AppError {
  return (
    error instanceof InvalidInputError ||
    error instanceof UnauthenticatedError ||
    error instanceof InvalidPostIdError ||
    error instanceof InvalidTitleError ||
    error instanceof InvalidContentError ||
    error instanceof InvalidProfileError ||
    error instanceof PostNotFoundError ||
    error instanceof ForbiddenError ||
    error instanceof IdentityProviderError ||
    error instanceof OperationFailedError
  );
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === 'string') return cause;
  return 'Unknown error';
}

/**
 * Runs a backend call and wraps anything it throws, except errors this
 * package already classified.
 */
export async function wrapOperation<T>(
  operation: OperationTag,
  run: () => Promise<T>,
): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (isAppError(error) && !(error instanceof IdentityProviderError)) {
      throw error;
    }
    throw new OperationFailedError(operation, error);
  }
}
