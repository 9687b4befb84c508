import { InvalidInputError } from '../common/errors';

const EMAIL_PATTERN = /^[A-Z0-9a-z._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,64}$/;
export const MIN_PASSWORD_LENGTH = 6;

export type Credentials = {
  email: string;
  password: string;
};

export function isValidEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email);
}

/**
 * Checks run in a fixed order and the first failure is thrown. Returns the
 * trimmed email alongside the password as entered.
 */
export function validateCredentials(email: string, password: string): Credentials {
  const emailTrimmed = email.trim();
  const passwordTrimmed = password.trim();

  if (!emailTrimmed) throw new InvalidInputError('Email cannot be empty.');
  if (!passwordTrimmed) throw new InvalidInputError('Password cannot be empty.');
  if (!isValidEmail(emailTrimmed)) {
    throw new InvalidInputError('Please enter a valid email address.');
  }
  if (passwordTrimmed.length < MIN_PASSWORD_LENGTH) {
    throw new InvalidInputError(
      `Password must be at least ${MIN_PASSWORD_LENGTH} characters long.`,
    );
  }

  return { email: emailTrimmed, password };
}
