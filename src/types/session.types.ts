/**
 * Session and credential types
 */

import { z } from 'zod';

/**
 * Client-credentials pair supplied by the caller at login
 */
export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
}

/**
 * Tenant routing metadata resolved once per login
 */
export interface RegionContext {
  tenantId: string;
  dataRegion: string;
  apiBase: string;
}

/**
 * In-memory session. A login either produces the full authenticated
 * variant or leaves the store unauthenticated.
 */
export type Session =
  | { status: 'unauthenticated' }
  | (RegionContext & {
      status: 'authenticated';
      credentials: ClientCredentials;
      accessToken: string;
      expiresAt: number; // Unix timestamp in milliseconds
    });

export type AuthenticatedSession = Extract<Session, { status: 'authenticated' }>;

/**
 * Snapshot handed to resource calls: copied from the session in one step
 */
export interface AccessContext {
  accessToken: string;
  tenantId: string;
  apiBase: string;
}

/**
 * Public view of the session (no token, no credentials)
 */
export interface SessionStatus {
  authenticated: boolean;
  tenantId?: string;
  dataRegion?: string;
  apiBase?: string;
  expiresAt?: string; // ISO 8601
}

/**
 * Result of a client-credentials token exchange
 */
export interface TokenGrant {
  accessToken: string;
  expiresInSeconds: number;
}

export const DEFAULT_TOKEN_LIFETIME_SECONDS = 3600;

/**
 * Token response from the identity provider
 */
export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive().optional(),
  token_type: z.string().optional(),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

/**
 * Who-am-I payload. Both region shapes are optional here; the region
 * resolver decides which one applies.
 */
export const WhoAmIResponseSchema = z.object({
  id: z.string().optional(),
  tenantId: z.string().optional(),
  idType: z.string().optional(),
  dataRegion: z.string().optional(),
  apiHosts: z
    .object({
      global: z.string().optional(),
      dataRegion: z.string().optional(),
    })
    .optional(),
});

export type WhoAmIResponse = z.infer<typeof WhoAmIResponseSchema>;
