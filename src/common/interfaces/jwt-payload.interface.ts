/** Claims of an access token minted by the identity provider. */
export type JwtPayload = {
  sub: string;
  email?: string;
  tokenType?: 'access' | 'refresh';
  jti?: string;
};
