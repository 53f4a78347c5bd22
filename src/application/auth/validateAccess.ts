import { TokenError } from '../../domain/auth/errors.js';
import type { AccessClaims, TokenCodec } from '../../domain/auth/tokenCodec.js';
import { storeCall, UnauthorizedError } from '../errors.js';
import type { OperationOptions } from '../ports.js';
import type { TokenDenylist } from './tokenDenylist.js';

const INVALID_ACCESS_TOKEN = 'Invalid or expired token';

export class ValidateAccessUseCase {
  constructor(
    private readonly denylist: TokenDenylist,
    private readonly codec: TokenCodec
  ) {}

  async execute(accessToken: string, options: OperationOptions = {}): Promise<AccessClaims> {
    options.signal?.throwIfAborted();

    const denied = await storeCall('denylist.has', () => this.denylist.has(accessToken));
    if (denied) {
      throw new UnauthorizedError(INVALID_ACCESS_TOKEN);
    }

    try {
      return this.codec.verifyAccess(accessToken);
    } catch (error) {
      if (error instanceof TokenError) {
        throw new UnauthorizedError(INVALID_ACCESS_TOKEN);
      }
      throw error;
    }
  }
}
