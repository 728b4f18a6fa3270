// Authentication-specific types and interfaces

import { AuthProvider } from '../types';

export interface AuthenticationResult {
  provider: AuthProvider;
  accessToken: string;
  tokenFile: string;
  /** Whether GET /me accepted the new token */
  tokenValid: boolean;
  userInfo?: unknown;
}

export interface IAuthManager {
  authenticate(provider: AuthProvider): Promise<AuthenticationResult>;
}
