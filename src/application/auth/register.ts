import { assertRegistrable } from '../../domain/auth/credentials.js';
import { InvalidCredentialFormatError } from '../../domain/auth/errors.js';
import type { PasswordHasher } from '../../domain/auth/password.js';
import type { User } from '../../domain/auth/user.js';
import { ConflictError, DuplicateRecordError, InvalidInputError, storeCall } from '../errors.js';
import type { ClientMetadata, OperationOptions, UserStore } from '../ports.js';
import type { AuthResult, TokenIssuer } from './tokenIssuer.js';

export interface RegisterCommand {
  email: string;
  password: string;
  client?: ClientMetadata;
}

const EMAIL_TAKEN = 'User with this email already exists';

export class RegisterUseCase {
  constructor(
    private readonly users: UserStore,
    private readonly passwords: PasswordHasher,
    private readonly issuer: TokenIssuer
  ) {}

  async execute(command: RegisterCommand, options: OperationOptions = {}): Promise<AuthResult> {
    let email: string;
    try {
      email = assertRegistrable(command.email, command.password);
    } catch (error) {
      if (error instanceof InvalidCredentialFormatError) {
        throw new InvalidInputError(error.message);
      }
      throw error;
    }

    // Check if user already exists
    const existing = await storeCall('users.findByEmail', () => this.users.findByEmail(email));
    if (existing) {
      throw new ConflictError(EMAIL_TAKEN);
    }

    const passwordHash = await this.passwords.hash(command.password);
    options.signal?.throwIfAborted();

    let user: User;
    try {
      user = await storeCall('users.create', () => this.users.create({ email, passwordHash }));
    } catch (error) {
      // Lost a race with a concurrent registration of the same email
      if (error instanceof DuplicateRecordError) {
        throw new ConflictError(EMAIL_TAKEN);
      }
      throw error;
    }

    return await this.issuer.issue(user, command.client);
  }
}
