export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type TokenErrorReason =
  | 'malformed'
  | 'expired'
  | 'wrong_type'
  | 'invalid_signature'
  | 'unsupported_algorithm';

export class TokenError extends DomainError {
  constructor(
    public readonly reason: TokenErrorReason,
    message = 'Invalid token'
  ) {
    super(message);
  }
}

export class InvalidCredentialFormatError extends DomainError {
  constructor(message: string) {
    super(message);
  }
}
