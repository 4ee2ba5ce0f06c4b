/**
 * HTTP plumbing shared by the portal and swap clients
 */

import axios, { AxiosAdapter, AxiosError, AxiosInstance } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { TransientNetworkError } from '../utils/errors';

export interface HttpClientOptions {
  baseURL: string;
  proxy: string | null;
  timeoutMs?: number;
  headers?: Record<string, string>;
  adapter?: AxiosAdapter;
}

/**
 * axios instance routed through the wallet's proxy. axios' own proxy option is
 * disabled so the agent handles CONNECT tunnelling for https targets.
 */
export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const agent = options.proxy ? new HttpsProxyAgent(options.proxy) : undefined;

  const client = axios.create({
    baseURL: options.baseURL,
    timeout: options.timeoutMs ?? 60_000,
    proxy: false,
    adapter: options.adapter,
    httpAgent: agent,
    httpsAgent: agent,
    headers: {
      Accept: 'application/json, text/plain, */*',
      ...options.headers,
    },
  });

  client.interceptors.response.use(undefined, (error: unknown) => Promise.reject(toTransportError(error)));
  return client;
}

/**
 * Rate limits, 5xx, timeouts and connection failures become
 * TransientNetworkError; everything else keeps its original shape.
 */
export function toTransportError(error: unknown): unknown {
  if (!axios.isAxiosError(error)) return error;

  const status = error.response?.status;
  if (status !== undefined && status !== 429 && status < 500) {
    return new Error(`HTTP ${status}: ${describeBody(error)}`);
  }

  const isTimeout = error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT;
  const message = status !== undefined ? `HTTP ${status}: ${describeBody(error)}` : `${error.code ?? 'network'}: ${error.message}`;
  return new TransientNetworkError(message, status, isTimeout, error);
}

function describeBody(error: AxiosError): string {
  const data = error.response?.data;
  if (typeof data === 'string') return data.slice(0, 200);
  if (data === undefined || data === null) return error.message;
  return JSON.stringify(data).slice(0, 200);
}
