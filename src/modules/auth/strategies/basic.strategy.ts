import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { BasicStrategy as Strategy } from 'passport-http';
import { CredentialsService } from '../credentials.service';
import { AuthenticatedUser } from '../authenticated-user';

/**
 * Passport strategy for HTTP Basic authentication
 *
 * Passport decodes the Authorization header; a request without one is
 * rejected before validate() is called.
 *
 * @example
 * ```typescript
 * @UseGuards(BasicAuthGuard)
 * getProtectedRoute(@CurrentUser() user: AuthenticatedUser) { ... }
 * ```
 */
@Injectable()
export class BasicStrategy extends PassportStrategy(Strategy, 'basic') {
  private readonly logger = new Logger(BasicStrategy.name);

  constructor(private readonly credentialsService: CredentialsService) {
    super();
  }

  /**
   * @returns the user attached to `request.user`
   * @throws UnauthorizedException for a wrong username or password
   */
  async validate(username: string, password: string): Promise<AuthenticatedUser> {
    const user = await this.credentialsService.verify(username, password);

    if (!user) {
      this.logger.warn(`Rejected credentials for user "${username}"`);
      throw new UnauthorizedException('Invalid credentials');
    }

    return user;
  }
}
