import { ApiProperty } from '@nestjs/swagger';

/**
 * Anti-forgery token for the authenticated user
 */
export class CsrfTokenDto {
  @ApiProperty({ example: 'X-CSRF-TOKEN', description: 'Header to send the token in' })
  headerName!: string;

  @ApiProperty({ description: 'Value for the header on POST, PUT and DELETE requests' })
  token!: string;
}
