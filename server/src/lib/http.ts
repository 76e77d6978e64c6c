import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { ENV } from './env';
import type { Failure } from './errors';

declare module 'axios' {
  interface AxiosRequestConfig {
    __retryCount?: number;
  }
}

export type RetryPolicy = {
  /** total attempts, first call included */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
  retryableStatuses: number[];
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: ENV.RETRY_MAX_ATTEMPTS,
  baseDelayMs: ENV.RETRY_BASE_DELAY_MS,
  maxDelayMs: ENV.RETRY_MAX_DELAY_MS,
  jitterMs: 100,
  retryableStatuses: [429, 500, 502, 503, 504],
};

export type HttpClientOptions = {
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  adapter?: AxiosAdapter;
  userAgent?: string;
};

const SNIPPET_MAX = 160;

export function backoffDelay(policy: RetryPolicy, retryNumber: number): number {
  const exponential = policy.baseDelayMs * Math.pow(2, Math.max(0, retryNumber - 1));
  const jitter = policy.jitterMs > 0 ? Math.random() * policy.jitterMs : 0;
  return Math.min(exponential + jitter, policy.maxDelayMs);
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function createHttpClient(options: HttpClientOptions = {}): AxiosInstance {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...(options.retry ?? {}) };

  const instance = axios.create({
    timeout: options.timeoutMs ?? ENV.RTMS_TIMEOUT_MS,
    headers: { 'User-Agent': options.userAgent ?? ENV.USER_AGENT },
    ...(options.adapter ? { adapter: options.adapter } : {}),
  });

  instance.interceptors.response.use(
    (response) => response,
    async (error: unknown) => {
      if (!axios.isAxiosError(error) || !error.config) {
        return Promise.reject(error);
      }
      const cfg = error.config;

      const method = (cfg.method ?? 'get').toLowerCase();
      if (method !== 'get' || error.code === 'ERR_CANCELED') {
        return Promise.reject(error);
      }

      const status = error.response?.status;
      const retriable = status == null || policy.retryableStatuses.includes(status);
      if (!retriable) {
        return Promise.reject(error);
      }

      const retryCount = cfg.__retryCount ?? 0;
      if (retryCount + 1 >= Math.max(1, policy.maxAttempts)) {
        return Promise.reject(error);
      }

      cfg.__retryCount = retryCount + 1;
      await sleep(backoffDelay(policy, cfg.__retryCount));

      return instance(cfg);
    }
  );

  return instance;
}

export const http = createHttpClient();

export function joinUrl(base: string, path: string) {
  const trimmedBase = base.replace(/\/+$/, '');
  const normalizedPath = path.startsWith('/') ? path : `/${path}`;
  return `${trimmedBase}${normalizedPath}`;
}

export function snippet(value: unknown): string | undefined {
  if (value == null) return undefined;

  let text: string;
  if (typeof value === 'string') {
    text = value;
  } else if (typeof value === 'object') {
    try {
      text = JSON.stringify(value);
    } catch {
      text = String(value);
    }
  } else {
    text = String(value);
  }

  text = text.replace(/\s+/g, ' ').trim();
  if (!text) return undefined;
  return text.length > SNIPPET_MAX ? text.slice(0, SNIPPET_MAX) : text;
}

/**
 * axios 예외를 Failure 로 변환한다. 응답이 있으면 http_error, 없으면 network_error.
 */
export function toFailure(error: unknown): Failure {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return {
        kind: 'http_error',
        status: error.response.status,
        message: snippet(error.response.data) ?? error.message,
      };
    }
    const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
    return {
      kind: 'network_error',
      message: timedOut ? `timeout (${error.message})` : error.message,
      ...(error.code ? { code: error.code } : {}),
    };
  }
  return { kind: 'network_error', message: error instanceof Error ? error.message : String(error) };
}
