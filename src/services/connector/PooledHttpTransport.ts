/**
 * Pooled HTTP transport for the panel
 *
 * One axios instance per upstream host with keep-alive agents, shared by the
 * authenticator and the resilient client so both reuse the same sockets.
 */

import axios, { AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';

export interface PooledTransportOptions {
  baseUrl: string;
  maxSockets: number;
  /** Idle sockets kept open per host */
  maxFreeSockets?: number;
}

export interface PooledTransport {
  readonly http: AxiosInstance;
  close(): void;
}

export function createPooledTransport(options: PooledTransportOptions): PooledTransport {
  const agentOptions = {
    keepAlive: true,
    maxSockets: options.maxSockets,
    maxFreeSockets: options.maxFreeSockets ?? Math.max(1, Math.floor(options.maxSockets / 2)),
  };
  const httpAgent = new http.Agent(agentOptions);
  const httpsAgent = new https.Agent(agentOptions);

  const instance = axios.create({
    baseURL: options.baseUrl.replace(/\/+$/, ''),
    httpAgent,
    httpsAgent,
    headers: { Accept: 'application/json' },
    // Status handling belongs to the caller; only transport failures reject
    validateStatus: () => true,
  });

  return {
    http: instance,
    close(): void {
      httpAgent.destroy();
      httpsAgent.destroy();
    },
  };
}
