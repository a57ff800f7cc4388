export const DEFAULT_TIMEOUT_MS = 15_000;

export interface HttpRequest {
  url: string;
  method: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
}

export interface HttpResponse {
  status: number;
  body: Buffer;
}

export type HttpTransport = (input: HttpRequest) => Promise<HttpResponse>;

export const createFetchTransport =
  (timeoutMs: number = DEFAULT_TIMEOUT_MS): HttpTransport =>
  async (input) => {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(input.url, {
        method: input.method,
        headers: input.headers,
        body: input.body,
        signal: controller.signal,
      });

      const body = Buffer.from(await response.arrayBuffer());
      return { status: response.status, body };
    } finally {
      clearTimeout(timeout);
    }
  };

export const isSuccessStatus = (status: number): boolean => status >= 200 && status < 300;

/** Parses a JSON response body; bodies that are not JSON read as an empty object. */
export const decodeJsonBody = (body: Buffer): unknown => {
  try {
    return JSON.parse(body.toString('utf8'));
  } catch {
    return {};
  }
};

export class DeadlineExceededError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DeadlineExceededError';
  }
}

/** Rejects with a timeout error when `operation` has not settled within `timeoutMs`. */
export const withDeadline = async <T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new DeadlineExceededError(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([operation, deadline]);
  } finally {
    clearTimeout(timer);
  }
};
