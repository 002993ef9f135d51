/**
 * Token acquisition.
 *
 * The OAuth2 client-credentials grant has no refresh token: refreshing a
 * session re-runs the grant with the stored credentials and workspace.
 */

import { z } from 'zod';
import type { Credentials, TokenGrant, WorkspaceSelection } from '../../types/session.js';
import type { Transport, TransportResponse } from '../request/transport.js';
import { FetchTransport } from '../request/transport.js';
import { SkyfleetError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { extractMessage } from '../request/classifier.js';

export interface Authenticator {
  authenticate(credentials: Credentials, workspace?: WorkspaceSelection): Promise<TokenGrant>;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default('Bearer'),
  expires_in: z.coerce.number().int().positive(),
  workspace_id: z.string().optional(),
  workspace_name: z.string().optional(),
  account_id: z.string().optional(),
});

export interface OAuthAuthenticatorOptions {
  transport?: Transport;
  timeoutMs: number;
}

export class OAuthClientCredentialsAuthenticator implements Authenticator {
  private readonly transport: Transport;
  private readonly timeoutMs: number;

  constructor(options: OAuthAuthenticatorOptions) {
    this.transport = options.transport ?? new FetchTransport();
    this.timeoutMs = options.timeoutMs;
  }

  async authenticate(credentials: Credentials, workspace?: WorkspaceSelection): Promise<TokenGrant> {
    const form = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: credentials.clientId,
      client_secret: credentials.clientSecret,
    });
    if (workspace?.workspaceId) {
      form.set('workspace_id', workspace.workspaceId);
    }

    let response: TransportResponse;
    try {
      response = await this.transport.send(
        {
          method: 'POST',
          url: credentials.tokenUrl,
          headers: {
            Accept: 'application/json',
            'Content-Type': 'application/x-www-form-urlencoded',
          },
          body: form.toString(),
        },
        AbortSignal.timeout(this.timeoutMs),
      );
    } catch (err) {
      throw new SkyfleetError(
        ExitCode.AUTHENTICATION_FAILED,
        `Token endpoint unreachable: ${credentials.tokenUrl}`,
        { cause: err, fix: 'Check network access and the api.tokenUrl setting' },
      );
    }

    if (response.status < 200 || response.status >= 300) {
      const body = response.body;
      const description = body !== null && typeof body === 'object' && 'error_description' in body
        ? String(body.error_description)
        : extractMessage(body);
      throw new SkyfleetError(
        ExitCode.AUTHENTICATION_FAILED,
        `Authentication failed (HTTP ${response.status})${description ? `: ${description}` : ''}`,
        {
          fix: 'Verify the client id and secret, and that the API client may access the workspace',
          details: { status: response.status },
        },
      );
    }

    const parsed = TokenResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new SkyfleetError(
        ExitCode.INVALID_RESPONSE,
        'Token endpoint returned an unexpected response',
        { details: { issues: parsed.error.issues.map((i) => i.path.join('.') || i.message) } },
      );
    }

    const token = parsed.data;
    return {
      accessToken: token.access_token,
      tokenType: token.token_type,
      expiresIn: token.expires_in,
      workspaceId: token.workspace_id ?? workspace?.workspaceId ?? null,
      workspaceName: token.workspace_name ?? workspace?.workspaceName ?? null,
      accountId: token.account_id ?? null,
    };
  }
}
