import { Injectable } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

/**
 * Rejects requests without valid HTTP Basic credentials with 401
 * and attaches the AuthenticatedUser to the request otherwise
 */
@Injectable()
export class BasicAuthGuard extends AuthGuard('basic') {}
