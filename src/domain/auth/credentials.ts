import { InvalidCredentialFormatError } from './errors.js';

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export const PASSWORD_RULES_MESSAGE =
  'Password must be at least 8 characters long and contain uppercase, lowercase, and number';

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function isValidEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email);
}

/**
 * At least 8 characters with one ASCII uppercase letter, one lowercase
 * letter and one digit.
 */
export function isValidPassword(password: string): boolean {
  return (
    password.length >= 8 &&
    /[A-Z]/.test(password) &&
    /[a-z]/.test(password) &&
    /[0-9]/.test(password)
  );
}

/**
 * Normalizes the email and checks both fields, returning the normalized
 * email.
 */
export function assertRegistrable(email: string, password: string): string {
  const normalized = normalizeEmail(email);
  if (!isValidEmail(normalized)) {
    throw new InvalidCredentialFormatError('Invalid email format');
  }
  if (!isValidPassword(password)) {
    throw new InvalidCredentialFormatError(PASSWORD_RULES_MESSAGE);
  }
  return normalized;
}
