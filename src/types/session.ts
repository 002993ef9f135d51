/**
 * Session and credential types.
 */

import { z } from 'zod';

/** OAuth2 client credentials used to obtain and refresh tokens. */
export const CredentialsSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  tokenUrl: z.string().url(),
});
export type Credentials = z.infer<typeof CredentialsSchema>;

/**
 * One authenticated context. Immutable: refresh and workspace switch
 * replace the whole object.
 */
export const SessionSchema = z.object({
  accessToken: z.string().min(1),
  tokenType: z.string().default('Bearer'),
  /** Epoch milliseconds. */
  issuedAt: z.number().int(),
  /** Epoch milliseconds. */
  expiresAt: z.number().int(),
  workspaceId: z.string().nullable(),
  workspaceName: z.string().nullable(),
  accountId: z.string().nullable(),
});
export type Session = z.infer<typeof SessionSchema>;

/** Result of a token grant, before it is turned into a Session. */
export interface TokenGrant {
  accessToken: string;
  tokenType: string;
  /** Lifetime in seconds. */
  expiresIn: number;
  workspaceId?: string | null;
  workspaceName?: string | null;
  accountId?: string | null;
}

/** Workspace selection passed to connect and switchWorkspace. */
export interface WorkspaceSelection {
  workspaceId?: string;
  workspaceName?: string;
}

/** On-disk shape of the session cache. */
export const SessionCacheFileSchema = z.object({
  version: z.literal(1),
  savedAt: z.string(),
  session: SessionSchema,
  credentials: CredentialsSchema,
});
export type SessionCacheFile = z.infer<typeof SessionCacheFileSchema>;
