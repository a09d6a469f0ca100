import { Controller, Get, UseGuards } from '@nestjs/common';
import { ApiBasicAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { BasicAuthGuard } from './guards/basic-auth.guard';
import { CurrentUser } from './decorators/current-user.decorator';
import { AuthenticatedUser } from './authenticated-user';
import { CSRF_HEADER_NAME, CsrfTokenService } from './csrf-token.service';
import { CsrfTokenDto } from './dto/csrf-token.dto';

@ApiTags('auth')
@ApiBasicAuth()
@Controller('csrf')
@UseGuards(BasicAuthGuard)
export class AuthController {
  constructor(private readonly csrfTokenService: CsrfTokenService) {}

  /**
   * Issues an anti-forgery token bound to the caller's username
   * @param user - Caller authenticated by BasicAuthGuard
   * @returns The header name and a token for it
   */
  @Get()
  @ApiOperation({
    summary: 'Get a CSRF token',
    description: 'Returns the token that state-changing requests must send in the X-CSRF-TOKEN header',
  })
  @ApiResponse({ status: 200, type: CsrfTokenDto })
  @ApiResponse({ status: 401, description: 'Missing or invalid credentials' })
  getCsrfToken(@CurrentUser() user: AuthenticatedUser): CsrfTokenDto {
    return {
      headerName: CSRF_HEADER_NAME,
      token: this.csrfTokenService.issue(user.username),
    };
  }
}
