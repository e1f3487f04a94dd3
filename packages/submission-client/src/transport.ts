export interface HttpRequest {
  url: string;
  method: "POST";
  headers: Record<string, string>;
  body: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  body: string;
}

export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

export const DEFAULT_TRANSPORT_TIMEOUT_MS = 30_000;

export class FetchHttpTransport implements HttpTransport {
  constructor(private readonly timeoutMs = DEFAULT_TRANSPORT_TIMEOUT_MS) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new Error(`Request timed out after ${this.timeoutMs}ms`));
    }, this.timeoutMs);
    const onCallerAbort = (): void => controller.abort(request.signal?.reason);
    if (request.signal?.aborted) {
      onCallerAbort();
    } else {
      request.signal?.addEventListener("abort", onCallerAbort, { once: true });
    }

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });
      return { status: response.status, body: await response.text() };
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener("abort", onCallerAbort);
    }
  }
}
