import { toProfile, type UserProfile } from '../../domain/auth/user.js';
import { storeCall, UnauthorizedError } from '../errors.js';
import type { OperationOptions, UserStore } from '../ports.js';

export class GetProfileUseCase {
  constructor(private readonly users: UserStore) {}

  async execute(userId: string, options: OperationOptions = {}): Promise<UserProfile> {
    options.signal?.throwIfAborted();

    const user = await storeCall('users.findById', () => this.users.findById(userId));
    // A token whose subject no longer exists is treated like any other bad token
    if (!user) {
      throw new UnauthorizedError();
    }
    return toProfile(user);
  }
}
