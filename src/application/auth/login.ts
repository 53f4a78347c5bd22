import { normalizeEmail } from '../../domain/auth/credentials.js';
import type { PasswordHasher } from '../../domain/auth/password.js';
import { storeCall, UnauthorizedError } from '../errors.js';
import type { ClientMetadata, Logger, OperationOptions, UserStore } from '../ports.js';
import type { AuthResult, TokenIssuer } from './tokenIssuer.js';

export interface LoginCommand {
  email: string;
  password: string;
  client?: ClientMetadata;
}

// Same message for unknown, inactive and wrong-password cases
export const INVALID_CREDENTIALS = 'Invalid email or password';

export class LoginUseCase {
  constructor(
    private readonly users: UserStore,
    private readonly passwords: PasswordHasher,
    private readonly issuer: TokenIssuer,
    private readonly logger: Logger
  ) {}

  async execute(command: LoginCommand, options: OperationOptions = {}): Promise<AuthResult> {
    const user = await storeCall('users.findByEmail', () =>
      this.users.findByEmail(normalizeEmail(command.email))
    );
    if (!user || !user.isActive) {
      throw new UnauthorizedError(INVALID_CREDENTIALS);
    }

    const isValid = await this.passwords.verify(command.password, user.passwordHash);
    if (!isValid) {
      throw new UnauthorizedError(INVALID_CREDENTIALS);
    }
    options.signal?.throwIfAborted();

    try {
      await this.users.updateLastLogin(user.id, new Date());
    } catch (error) {
      this.logger.warn('Failed to update last login', { userId: user.id, error });
    }

    return await this.issuer.issue(user, command.client);
  }
}
