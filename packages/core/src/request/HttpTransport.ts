export interface TransportRequest {
  url: string;
  body: string;
  headers: Record<string, string>;
  timeoutMs?: number;
}

export interface TransportResponse {
  status: number;
  body: string;
}

/** Rejects only when no HTTP response arrived (connection failure, timeout). */
export interface HttpTransport {
  post(request: TransportRequest): Promise<TransportResponse>;
}

export class TransportTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = "TransportTimeoutError";
  }
}

export class FetchTransport implements HttpTransport {
  async post(request: TransportRequest): Promise<TransportResponse> {
    const controller = new AbortController();
    const timeout =
      request.timeoutMs !== undefined ? setTimeout(() => controller.abort(), request.timeoutMs) : undefined;
    try {
      const response = await fetch(request.url, {
        method: "POST",
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });
      return { status: response.status, body: await response.text() };
    } catch (error) {
      if (controller.signal.aborted && request.timeoutMs !== undefined) {
        throw new TransportTimeoutError(request.timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }
}
