import { AdminConfig } from '../../connections/config/app.config';
import { UnauthorizedError } from '../../utils/errors';

export interface TokenResponse {
  access_token: string;
  token_type: 'bearer';
}

/**
 * Single-administrator auth. The token is static and never expires, so any
 * holder of it is the administrator until the configuration changes.
 */
export class AuthService {
  constructor(private readonly admin: AdminConfig) {}

  login(username: string, password: string): TokenResponse {
    if (username !== this.admin.username || password !== this.admin.password) {
      throw new UnauthorizedError('Incorrect username or password');
    }
    return { access_token: this.admin.token, token_type: 'bearer' };
  }

  /**
   * @returns the administrator's username
   */
  authorize(token: string): string {
    if (token !== this.admin.token) {
      throw new UnauthorizedError('Invalid authentication credentials');
    }
    return this.admin.username;
  }
}
