export interface HttpSessionOptions {
  headers?: Record<string, string>;
  userAgent?: string;
  defaultTimeoutMs?: number;
}

export interface SessionResponse {
  ok: boolean;
  status: number;
  statusText: string;
  url: string;
  headers: Record<string, string>;
  text: string;
}

export class HttpSessionError extends Error {
  constructor(
    message: string,
    public url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'HttpSessionError';
  }
}

export const DEFAULT_SESSION_HEADERS: Readonly<Record<string, string>> = {
  Accept: 'text/html,application/xhtml+xml,application/xml',
  'Accept-Language': 'en-US,en;q=0.5',
  'Upgrade-Insecure-Requests': '1',
};

/**
 * Shared network session for one run. Every request carries the same default
 * headers; non-2xx responses are returned, transport failures throw.
 * Uses native fetch() (Node 20+).
 */
export class HttpSession {
  private headers: Record<string, string>;
  private defaultTimeoutMs: number;

  constructor(options: HttpSessionOptions = {}) {
    this.headers = {
      ...DEFAULT_SESSION_HEADERS,
      'User-Agent': options.userAgent ?? 'HTML-QA/0.1',
      ...options.headers,
    };
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 30000;
  }

  async request(method: 'GET' | 'OPTIONS', url: string, timeoutMs?: number): Promise<SessionResponse> {
    const limitMs = timeoutMs ?? this.defaultTimeoutMs;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), limitMs);

    try {
      const response = await fetch(url, {
        method,
        headers: { ...this.headers },
        redirect: 'follow',
        signal: controller.signal,
      });

      return {
        ok: response.ok,
        status: response.status,
        statusText: response.statusText,
        url: response.url || url,
        headers: Object.fromEntries(response.headers.entries()),
        text: method === 'GET' ? await response.text() : '',
      };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new HttpSessionError(`Request timed out after ${limitMs}ms`, url, { cause: error });
      }

      throw new HttpSessionError(
        error instanceof Error ? error.message : String(error),
        url,
        { cause: error },
      );
    } finally {
      clearTimeout(timeout);
    }
  }

  async get(url: string, timeoutMs?: number): Promise<SessionResponse> {
    return this.request('GET', url, timeoutMs);
  }

  async options(url: string, timeoutMs?: number): Promise<SessionResponse> {
    return this.request('OPTIONS', url, timeoutMs);
  }
}
