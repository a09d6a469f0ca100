import { Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';

/** Request header that carries the anti-forgery token */
export const CSRF_HEADER_NAME = 'X-CSRF-TOKEN';

/**
 * Issues and checks anti-forgery tokens
 *
 * A token is an HS256 JWT signed with the configured CSRF secret whose `sub`
 * claim is the username it was issued to, so it is only valid for that user.
 * Nothing is stored server-side.
 */
@Injectable()
export class CsrfTokenService {
  private readonly logger = new Logger(CsrfTokenService.name);

  /**
   * @param jwtService - Signer configured with the CSRF secret by AuthModule
   */
  constructor(private readonly jwtService: JwtService) {}

  /**
   * Signs a token bound to `username`
   *
   * @returns Compact JWT to send back in the X-CSRF-TOKEN header
   */
  issue(username: string): string {
    return this.jwtService.sign({ sub: username });
  }

  /**
   * Checks the signature of `token` and that it was issued to `username`
   *
   * @returns false for a missing, malformed, tampered or foreign token
   */
  verify(username: string, token: string | undefined): boolean {
    if (!token) {
      return false;
    }

    try {
      const payload = this.jwtService.verify<Record<string, unknown>>(token);
      return payload.sub === username;
    } catch (error) {
      this.logger.debug(`Rejected CSRF token: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }
}
