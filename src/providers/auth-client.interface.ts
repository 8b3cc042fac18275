import type { ClientCredentials, TokenGrant } from '../types/session.types.js';

/**
 * Auth Client Interface
 *
 * Contract for the identity side of the remote API: the client-credentials
 * token exchange and the who-am-I lookup that yields tenant routing data.
 */
export interface IAuthClient {
  /**
   * Exchanges a client identifier/secret pair for a bearer token
   * @throws AuthenticationError when the identity provider rejects the request
   */
  exchangeToken(credentials: ClientCredentials): Promise<TokenGrant>;

  /**
   * Fetches tenant/region metadata for the token's owner
   * @returns the raw who-am-I payload, parsed by the region resolver
   */
  whoAmI(accessToken: string): Promise<unknown>;
}
