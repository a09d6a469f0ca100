/**
 * Identity attached to the request once the credential check passes
 */
export interface AuthenticatedUser {
  username: string;
}

export function isAuthenticatedUser(value: unknown): value is AuthenticatedUser {
  return (
    typeof value === 'object' &&
    value !== null &&
    'username' in value &&
    typeof value.username === 'string'
  );
}
