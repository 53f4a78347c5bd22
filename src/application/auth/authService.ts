import type { PasswordHasher } from '../../domain/auth/password.js';
import type { AccessClaims, TokenCodec } from '../../domain/auth/tokenCodec.js';
import type { UserProfile } from '../../domain/auth/user.js';
import type { Logger, OperationOptions, RefreshTokenStore, RevocationStore, UserStore } from '../ports.js';
import { GetProfileUseCase } from './getProfile.js';
import { LoginUseCase, type LoginCommand } from './login.js';
import { LogoutUseCase, type LogoutCommand, type LogoutResult } from './logout.js';
import { RefreshUseCase, type RefreshCommand } from './refresh.js';
import { RefreshTokenRevocation } from './refreshTokenRevocation.js';
import { RegisterUseCase, type RegisterCommand } from './register.js';
import { TokenDenylist } from './tokenDenylist.js';
import { TokenIssuer, type AuthResult } from './tokenIssuer.js';
import { ValidateAccessUseCase } from './validateAccess.js';

/**
 * Credential lifecycle operations consumed by the HTTP boundary.
 */
export interface AuthService {
  register(command: RegisterCommand, options?: OperationOptions): Promise<AuthResult>;
  login(command: LoginCommand, options?: OperationOptions): Promise<AuthResult>;
  refresh(command: RefreshCommand, options?: OperationOptions): Promise<AuthResult>;
  logout(command: LogoutCommand, options?: OperationOptions): Promise<LogoutResult>;
  validateAccess(accessToken: string, options?: OperationOptions): Promise<AccessClaims>;
  getProfile(userId: string, options?: OperationOptions): Promise<UserProfile>;
}

export interface AuthServiceDeps {
  users: UserStore;
  refreshTokens: RefreshTokenStore;
  revocations: RevocationStore;
  codec: TokenCodec;
  passwords: PasswordHasher;
  logger: Logger;
}

export function createAuthService(deps: AuthServiceDeps): AuthService {
  const { users, refreshTokens, codec, passwords, logger } = deps;
  const denylist = new TokenDenylist(deps.revocations);
  const revocation = new RefreshTokenRevocation(denylist, refreshTokens, logger);
  const issuer = new TokenIssuer(codec, refreshTokens);

  const registerUseCase = new RegisterUseCase(users, passwords, issuer);
  const loginUseCase = new LoginUseCase(users, passwords, issuer, logger);
  const refreshUseCase = new RefreshUseCase(users, refreshTokens, denylist, revocation, codec, issuer);
  const logoutUseCase = new LogoutUseCase(refreshTokens, revocation, logger);
  const validateAccessUseCase = new ValidateAccessUseCase(denylist, codec);
  const getProfileUseCase = new GetProfileUseCase(users);

  return {
    register: (command, options) => registerUseCase.execute(command, options),
    login: (command, options) => loginUseCase.execute(command, options),
    refresh: (command, options) => refreshUseCase.execute(command, options),
    logout: (command, options) => logoutUseCase.execute(command, options),
    validateAccess: (accessToken, options) => validateAccessUseCase.execute(accessToken, options),
    getProfile: (userId, options) => getProfileUseCase.execute(userId, options),
  };
}
