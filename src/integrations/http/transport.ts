/**
 * HTTP Transport
 *
 * The generic async request/response capability every outbound call goes
 * through. Policy checks, ingestion and exporters depend only on
 * `HttpTransport`; `AxiosTransport` is the production implementation.
 */
import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { GuardError, describeError } from '../../utils/errors';

export interface TransportRequest {
  /** Path relative to the transport's base URL */
  path: string;
  body: unknown;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export interface TransportResponse<T = unknown> {
  status: number;
  data: T;
}

export interface HttpTransport {
  /**
   * Resolves only for 2xx responses; the payload is left for the caller to
   * validate. Network failures, timeouts and non-success statuses reject
   * with TransportError.
   */
  post(request: TransportRequest): Promise<TransportResponse>;
  get(path: string): Promise<TransportResponse>;
}

/**
 * A failed outbound request. `status` is set when the remote answered with a
 * non-success status; `networkCode` carries the network error code (ECONNREFUSED,
 * ECONNABORTED, ...) when there was no answer.
 */
export class TransportError extends GuardError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly networkCode?: string,
  ) {
    super(message, 'TRANSPORT_ERROR', 502, { status, networkCode });
    this.name = 'TransportError';
  }
}

export interface AxiosTransportOptions {
  baseUrl: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
  /** Custom axios adapter; lets tests answer requests in-process */
  adapter?: AxiosAdapter;
}

export class AxiosTransport implements HttpTransport {
  private client: AxiosInstance;

  constructor(options: AxiosTransportOptions) {
    this.client = axios.create({
      baseURL: options.baseUrl.replace(/\/+$/, ''),
      timeout: options.timeoutMs ?? 30000,
      headers: {
        'Content-Type': 'application/json',
        ...options.headers,
      },
      ...(options.adapter && { adapter: options.adapter }),
    });
  }

  async post(request: TransportRequest): Promise<TransportResponse> {
    try {
      const response = await this.client.post<unknown>(request.path, request.body, {
        headers: request.headers,
        ...(request.timeoutMs !== undefined && { timeout: request.timeoutMs }),
      });
      return { status: response.status, data: response.data };
    } catch (error) {
      throw toTransportError('POST', request.path, error);
    }
  }

  async get(path: string): Promise<TransportResponse> {
    try {
      const response = await this.client.get<unknown>(path);
      return { status: response.status, data: response.data };
    } catch (error) {
      throw toTransportError('GET', path, error);
    }
  }
}

function toTransportError(method: string, path: string, error: unknown): TransportError {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) {
      return new TransportError(`${method} ${path} failed with status ${status}`, status);
    }
    return new TransportError(`${method} ${path} failed: ${error.message}`, undefined, error.code);
  }
  return new TransportError(`${method} ${path} failed: ${describeError(error)}`);
}
