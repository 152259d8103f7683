/**
 * Panel Authenticator
 *
 * Exchanges the admin username/password for a bearer token
 * (form POST to /api/admin/token). Used by TokenManager; never called through
 * ResilientHttpClient, which depends on the credential it produces.
 */

import { AxiosError, AxiosInstance } from 'axios';
import { z } from 'zod';
import { Logger } from '../../services/core/Logger';
import type { Authenticator } from '../../services/auth/TokenManager';
import type { Credential } from '../../types/HttpTypes';
import { Clock, MS_PER_SECOND, systemClock } from '../../types/CommonTypes';
import {
  AuthenticationError,
  InvalidUpstreamResponseError,
  TransientNetworkError,
} from '../../types/PanelErrors';

export const PANEL_TOKEN_PATH = '/api/admin/token';

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().positive().optional(),
});

export interface PanelAuthenticatorConfig {
  username: string;
  password: string;
  requestTimeoutMs: number;
}

export class PanelAuthenticator implements Authenticator {
  constructor(
    private readonly http: AxiosInstance,
    private readonly config: PanelAuthenticatorConfig,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock
  ) {}

  async authenticate(): Promise<Credential> {
    const form = new URLSearchParams({
      username: this.config.username,
      password: this.config.password,
    });

    let response;
    try {
      response = await this.http.post(PANEL_TOKEN_PATH, form.toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        timeout: this.config.requestTimeoutMs,
      });
    } catch (error) {
      if (error instanceof AxiosError) {
        throw new TransientNetworkError(
          `Panel authentication request failed: ${error.message}`,
          undefined,
          error.code ?? 'AUTH_NETWORK_ERROR'
        );
      }
      throw error;
    }

    if (response.status === 401 || response.status === 403) {
      this.logger.error('Panel rejected admin credentials', { status: response.status });
      throw new AuthenticationError(
        `Panel authentication failed with HTTP ${response.status}`,
        'ADMIN_CREDENTIALS_REJECTED'
      );
    }

    if (response.status >= 500 || response.status === 429) {
      throw new TransientNetworkError(
        `Panel authentication responded with HTTP ${response.status}`,
        response.status,
        `HTTP_${response.status}`
      );
    }

    if (response.status < 200 || response.status >= 300) {
      throw new AuthenticationError(
        `Panel authentication failed with HTTP ${response.status}`,
        `HTTP_${response.status}`
      );
    }

    const parsed = TokenResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new InvalidUpstreamResponseError(
        `Invalid panel token response: ${parsed.error.message}`
      );
    }

    const issuedAt = this.clock();
    const { access_token, expires_in } = parsed.data;
    return {
      token: access_token,
      issuedAt,
      ...(expires_in !== undefined ? { expiresAt: issuedAt + expires_in * MS_PER_SECOND } : {}),
    };
  }
}
