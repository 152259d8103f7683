/**
 * Panel API Client
 *
 * Maps user operations onto ResilientHttpClient calls against the panel's
 * /api/user resource and translates transport outcomes into domain errors:
 *
 * - 404 -> NotFoundError, 409 -> ConflictError, 400/422 -> ValidationError
 * - circuit open, exhausted retries, deadline, rejected credentials, other 4xx
 *   -> UpstreamUnavailableError
 * - payload failing the envelope schema -> InvalidUpstreamResponseError
 */

import { Logger } from '../../services/core/Logger';
import type { ResilientHttpClient } from '../../services/connector/ResilientHttpClient';
import type { IPanelApiClient, PanelUsage } from '../IPanelApiClient';
import type { PanelHttpRequest } from '../../types/HttpTypes';
import {
  CreatePanelUserInput,
  PanelUser,
  PanelUserResponseSchema,
  UpdatePanelUserInput,
} from '../../types/SubscriptionTypes';
import {
  ConflictError,
  HttpStatusError,
  InvalidUpstreamResponseError,
  NotFoundError,
  PanelError,
  UpstreamUnavailableError,
  ValidationError,
} from '../../types/PanelErrors';

export const PANEL_USER_PATH = '/api/user';

export interface PanelApiClientConfig {
  /** Proxy protocols enabled on new users, e.g. ['vless'] */
  proxyProtocols: readonly string[];
}

export class PanelApiClient implements IPanelApiClient {
  constructor(
    private readonly httpClient: ResilientHttpClient,
    private readonly config: PanelApiClientConfig,
    private readonly logger: Logger
  ) {}

  async createUser(input: CreatePanelUserInput): Promise<PanelUser> {
    const proxies: Record<string, Record<string, never>> = {};
    for (const protocol of this.config.proxyProtocols) {
      proxies[protocol] = {};
    }

    const data = await this.call('createUser', input.username, {
      method: 'POST',
      path: PANEL_USER_PATH,
      body: {
        username: input.username,
        proxies,
        data_limit: input.dataLimit,
        expire: input.expireAt,
        status: 'active',
      },
    });
    const user = this.parseUser(data, input.username);
    this.logger.info('Panel user created', { username: user.username });
    return user;
  }

  async getUser(username: string): Promise<PanelUser> {
    const data = await this.call('getUser', username, {
      method: 'GET',
      path: this.userPath(username),
    });
    return this.parseUser(data, username);
  }

  async updateUser(username: string, input: UpdatePanelUserInput): Promise<PanelUser> {
    const body: Record<string, unknown> = {};
    if (input.dataLimit !== undefined) {
      body.data_limit = input.dataLimit;
    }
    if (input.expireAt !== undefined) {
      body.expire = input.expireAt;
    }
    if (input.status !== undefined) {
      body.status = input.status;
    }
    if (Object.keys(body).length === 0) {
      throw new ValidationError('update', 'No fields to update');
    }

    const data = await this.call('updateUser', username, {
      method: 'PUT',
      path: this.userPath(username),
      body,
    });
    const user = this.parseUser(data, username);
    this.logger.info('Panel user updated', { username, fields: Object.keys(body) });
    return user;
  }

  async deleteUser(username: string): Promise<void> {
    await this.call('deleteUser', username, {
      method: 'DELETE',
      path: this.userPath(username),
    });
    this.logger.info('Panel user deleted', { username });
  }

  async getUserUsage(username: string): Promise<PanelUsage> {
    const user = await this.getUser(username);
    return {
      usedTraffic: user.usedTraffic,
      dataLimit: user.dataLimit,
      expireAt: user.expireAt,
      status: user.status,
    };
  }

  private userPath(username: string): string {
    return `${PANEL_USER_PATH}/${encodeURIComponent(username)}`;
  }

  private async call(operation: string, username: string, request: PanelHttpRequest): Promise<unknown> {
    try {
      const response = await this.httpClient.execute(request);
      return response.data;
    } catch (error) {
      throw this.translate(operation, username, error);
    }
  }

  private translate(operation: string, username: string, error: unknown): Error {
    if (error instanceof HttpStatusError) {
      switch (error.status) {
        case 404:
          return new NotFoundError('Panel user', username);
        case 409:
          return new ConflictError(`Panel user already exists: ${username}`);
        case 400:
        case 422:
          return new ValidationError('request', `Panel rejected ${operation} for ${username}: ${describeBody(error.responseBody)}`);
        default:
          this.logger.error('Panel returned unexpected status', { operation, username, status: error.status });
          return new UpstreamUnavailableError(`Panel ${operation} failed with HTTP ${error.status}`, error);
      }
    }

    if (error instanceof PanelError) {
      this.logger.warn('Panel unavailable', {
        operation,
        username,
        errorClass: error.error_class,
        errorCode: error.error_code,
      });
      return new UpstreamUnavailableError(`Panel ${operation} unavailable: ${error.message}`, error);
    }

    return error instanceof Error ? error : new Error(String(error));
  }

  private parseUser(data: unknown, username: string): PanelUser {
    const parsed = PanelUserResponseSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.error('Invalid panel user payload', { username, issues: parsed.error.issues.length });
      throw new InvalidUpstreamResponseError(
        `Invalid panel user response for ${username}: ${parsed.error.message}`
      );
    }
    const user = parsed.data;
    return {
      username: user.username,
      dataLimit: user.data_limit ?? 0,
      usedTraffic: user.used_traffic,
      expireAt: user.expire === null || user.expire === 0 ? null : user.expire,
      status: user.status,
      subscriptionUrl: user.subscription_url ?? '',
    };
  }
}

function describeBody(body: unknown): string {
  if (body && typeof body === 'object' && 'detail' in body) {
    const detail = body.detail;
    return typeof detail === 'string' ? detail : JSON.stringify(detail);
  }
  return typeof body === 'string' ? body : JSON.stringify(body);
}
