import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { JwtModule } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { AuthController } from './auth.controller';
import { CredentialsService } from './credentials.service';
import { CsrfTokenService } from './csrf-token.service';
import { BasicStrategy } from './strategies/basic.strategy';
import { BasicAuthGuard } from './guards/basic-auth.guard';
import { CsrfGuard } from './guards/csrf.guard';
import authConfig from '../../config/auth.config';

/**
 * HTTP Basic authentication and anti-forgery protection
 *
 * Feature modules import this module and put `@UseGuards(BasicAuthGuard, CsrfGuard)`
 * on their controllers. The `auth` configuration namespace must be loaded
 * globally.
 */
@Module({
  imports: [
    PassportModule.register({ defaultStrategy: 'basic' }),

    /** Signs anti-forgery tokens with the CSRF secret */
    JwtModule.registerAsync({
      inject: [authConfig.KEY],
      useFactory: (auth: ConfigType<typeof authConfig>) => ({
        secret: auth.csrfSecret,
      }),
    }),
  ],
  controllers: [AuthController],
  providers: [CredentialsService, CsrfTokenService, BasicStrategy, BasicAuthGuard, CsrfGuard],
  exports: [CsrfTokenService, BasicAuthGuard, CsrfGuard],
})
export class AuthModule {}
