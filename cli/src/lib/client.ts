import type { Logger } from 'winston';
import { CLI_CONFIG } from '../config/defaults';
import { HttpError, TransportError, errorMessage } from '../utils/error-handler';
import { formatDuration } from '../utils/logger';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export interface ApiResponse {
  status: number;
  body: string;
}

export interface ApiClientOptions {
  baseUrl: string;
  token?: string;
  logger: Logger;
  timeoutMs?: number;
  signal?: AbortSignal;                // Interrupt (Ctrl-C) signal
  fetchImplementation?: typeof fetch;
}

const DEFAULT_TIMEOUT_MS = 30_000;

interface CombinedSignal {
  signal: AbortSignal;
  /** Detach the listeners added to the source signals. */
  dispose: () => void;
}

function combineAbortSignals(primary: AbortSignal, secondary?: AbortSignal): CombinedSignal {
  if (!secondary) return { signal: primary, dispose: () => undefined };
  const controller = new AbortController();
  const propagate = () => controller.abort();
  if (primary.aborted || secondary.aborted) controller.abort();
  primary.addEventListener('abort', propagate, { once: true });
  secondary.addEventListener('abort', propagate, { once: true });
  return {
    signal: controller.signal,
    dispose: () => {
      primary.removeEventListener('abort', propagate);
      secondary.removeEventListener('abort', propagate);
    }
  };
}

/**
 * One HTTP call per method against the JSON:API server. Bodies come back as
 * text so callers can print them verbatim when the server rejects a request.
 */
export class ApiClient {
  private readonly baseUrl: string;
  private readonly fetchImplementation: typeof fetch;

  constructor(private readonly options: ApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImplementation = options.fetchImplementation ?? fetch;
  }

  async get(path: string, query?: URLSearchParams): Promise<ApiResponse> {
    return this.request('GET', path, { query });
  }

  async post(path: string, body: unknown): Promise<ApiResponse> {
    return this.request('POST', path, { body });
  }

  async patch(path: string, body: unknown): Promise<ApiResponse> {
    return this.request('PATCH', path, { body });
  }

  async delete(path: string): Promise<ApiResponse> {
    return this.request('DELETE', path, {});
  }

  private buildUrl(path: string, query?: URLSearchParams): string {
    const url = new URL(this.baseUrl + path);
    query?.forEach((value, key) => url.searchParams.append(key, value));
    return url.toString();
  }

  private async request(
    method: HttpMethod,
    path: string,
    { query, body }: { query?: URLSearchParams; body?: unknown }
  ): Promise<ApiResponse> {
    const url = this.buildUrl(path, query);
    const timeoutMs = this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    const headers: Record<string, string> = {
      accept: CLI_CONFIG.CONTENT_TYPE,
      'user-agent': `xbe-cli/${CLI_CONFIG.VERSION}`
    };
    if (body !== undefined) {
      headers['content-type'] = CLI_CONFIG.CONTENT_TYPE;
    }
    if (this.options.token) {
      headers.authorization = `Bearer ${this.options.token}`;
    }

    const timeoutController = new AbortController();
    const timeoutId = setTimeout(() => timeoutController.abort(), timeoutMs);
    const { signal, dispose } = combineAbortSignals(timeoutController.signal, this.options.signal);

    const startedAt = Date.now();
    this.options.logger.debug(`${method} ${url}`);

    try {
      let response: Response;
      try {
        response = await this.fetchImplementation(url, {
          method,
          headers,
          body: body !== undefined ? JSON.stringify(body) : undefined,
          signal
        });
      } catch (error) {
        if (this.options.signal?.aborted) {
          throw new TransportError(`${method} ${path} cancelled`, { cause: error });
        }
        if (timeoutController.signal.aborted) {
          throw new TransportError(`${method} ${path} timed out after ${formatDuration(timeoutMs)}`, { cause: error });
        }
        throw new TransportError(`${method} ${path} failed: ${errorMessage(error)}`, { cause: error });
      }

      const text = await response.text();
      this.options.logger.debug(
        `${method} ${url} -> ${response.status} (${formatDuration(Date.now() - startedAt)})`
      );

      if (response.status < 200 || response.status > 299) {
        throw new HttpError(response.status, method, path, text);
      }
      return { status: response.status, body: text };
    } finally {
      clearTimeout(timeoutId);
      dispose();
    }
  }
}
