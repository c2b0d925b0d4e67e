export interface TokenResponse {
    accessToken: string;
    tokenType: 'bearer';
}

/** Claims carried by issued tokens. `exp` is present only when an expiry is configured. */
export interface TokenClaims {
    sub: string;
    iss: string;
    iat: number;
    exp?: number;
}
