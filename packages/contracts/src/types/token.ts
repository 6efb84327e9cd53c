export interface IssuedSession {
  readonly token: string;
  readonly tokenType: "bearer";
  readonly username: string;
  readonly expiresInSeconds: number;
  readonly expiresAt: string;
}

export interface SessionTokenClaims {
  readonly iss: string;
  readonly sub: string;
  readonly iat: number;
  readonly exp: number;
  readonly jti: string;
  readonly token_type: "session";
}
