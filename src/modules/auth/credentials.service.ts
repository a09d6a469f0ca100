import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import * as bcrypt from 'bcrypt';
import authConfig from '../../config/auth.config';
import { AuthenticatedUser } from './authenticated-user';

/** bcrypt cost used when the password is hashed at startup */
const SALT_ROUNDS = 10;

/**
 * Checks credentials against the single configured account
 *
 * The account comes from the `auth` configuration namespace, so tests and
 * deployments supply their own instead of sharing a process-wide user list.
 */
@Injectable()
export class CredentialsService {
  private readonly username: string;
  private readonly passwordHash: string;

  constructor(
    @Inject(authConfig.KEY)
    config: ConfigType<typeof authConfig>,
  ) {
    this.username = config.username;
    this.passwordHash = config.passwordHash ?? bcrypt.hashSync(config.password, SALT_ROUNDS);
  }

  /**
   * @returns the authenticated user, or null when the username or password is wrong
   */
  async verify(username: string, password: string): Promise<AuthenticatedUser | null> {
    // Compare even for an unknown username so both failures take the same time
    const passwordMatches = await bcrypt.compare(password, this.passwordHash);

    if (username !== this.username || !passwordMatches) {
      return null;
    }
    return { username };
  }
}
