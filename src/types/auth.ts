export interface OAuthTokens {
  accessToken: string;
  refreshToken?: string;
  expiresAt?: Date;
  scope?: string;
}

export interface OAuthState {
  provider: 'gmail';
  redirectUrl?: string;
  timestamp: number;
}

// Tokens are stored encrypted; timestamps as ISO strings
export interface StoredAccount {
  accountId: string;
  accessToken: string;
  refreshToken?: string;
  expiresAt?: string;
  scope?: string;
  addedAt: string;
  lastScannedAt?: string;
}

export interface AccountSummary {
  accountId: string;
  addedAt: string;
  lastScannedAt?: string;
}

export interface AuthenticatedAccount {
  accountId: string;
}
