/**
 * Metrics endpoint client
 * Fetches `/metrics` from a node's REST port with axios
 * @module @replica-drill/core/adapters/metrics-client
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';

// ============================================================================
// Types
// ============================================================================

/**
 * Raw metrics response. Any HTTP status is returned, never thrown.
 */
export interface MetricsResponse {
  status: number;
  body: string;
}

/**
 * Port the Health Monitor probes through
 */
export interface MetricsClient {
  fetchMetrics(host: string, port: number): Promise<MetricsResponse>;
}

export interface AxiosMetricsClientConfig {
  /** Timeout of a single request */
  timeoutMs: number;
}

/**
 * The request never produced a response: refused, reset or timed out
 */
export class MetricsTransportError extends Error {
  readonly code?: string;
  readonly isTimeout: boolean;

  constructor(message: string, options: { code?: string; isTimeout?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'MetricsTransportError';
    this.code = options.code;
    this.isTimeout = options.isTimeout ?? false;
  }
}

export function isMetricsTransportError(error: unknown): error is MetricsTransportError {
  return error instanceof MetricsTransportError;
}

// ============================================================================
// Axios client
// ============================================================================

export class AxiosMetricsClient implements MetricsClient {
  private readonly client: AxiosInstance;

  constructor(config: AxiosMetricsClientConfig) {
    this.client = axios.create({
      timeout: config.timeoutMs,
      responseType: 'text',
      // Body is classified by the caller, keep it as text
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });
  }

  async fetchMetrics(host: string, port: number): Promise<MetricsResponse> {
    try {
      const response = await this.client.get<unknown>(metricsUrl(host, port));
      return {
        status: response.status,
        body: typeof response.data === 'string' ? response.data : '',
      };
    } catch (error) {
      throw toTransportError(error);
    }
  }
}

export function metricsUrl(host: string, port: number): string {
  return `http://${host}:${port}/metrics`;
}

function toTransportError(error: unknown): MetricsTransportError {
  if (axios.isAxiosError(error)) {
    return new MetricsTransportError(error.message || 'Request failed', {
      code: error.code,
      isTimeout: error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT',
      cause: error,
    });
  }

  if (error instanceof Error) {
    return new MetricsTransportError(error.message, { cause: error });
  }

  return new MetricsTransportError(String(error));
}
