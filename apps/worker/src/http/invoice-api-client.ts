/**
 * Single-attempt client for the external invoice processing API.
 * No retries here; the resilient caller owns policy.
 */

export interface InvoiceApiConfig {
  baseUrl: string;
  /** Per-request timeout (ms) */
  timeoutMs: number;
  userAgent?: string;
}

export interface InvoiceApiResponse {
  status: number;
  bodyText: string;
  latencyMs: number;
}

export interface InvoiceApi {
  readonly endpoint: string;
  /**
   * POST one invoice. Resolves with any HTTP answer; rejects on timeout or
   * network failure.
   */
  submit(invoiceId: string, token: string): Promise<InvoiceApiResponse>;
}

export class InvoiceApiTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms`);
    this.name = "InvoiceApiTimeoutError";
  }
}

export class InvoiceApiClient implements InvoiceApi {
  readonly endpoint: string;
  private readonly baseUrl: string;

  constructor(
    private readonly config: InvoiceApiConfig,
    private readonly fetchFn: typeof fetch = fetch
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.endpoint = new URL(this.baseUrl).host;
  }

  urlFor(invoiceId: string): string {
    return `${this.baseUrl}/${encodeURIComponent(invoiceId)}`;
  }

  async submit(invoiceId: string, token: string): Promise<InvoiceApiResponse> {
    const start = Date.now();
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await this.fetchFn(this.urlFor(invoiceId), {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "User-Agent": this.config.userAgent ?? "invoice-dispatch/1.0",
          Authorization: `Bearer ${token}`,
        },
        body: JSON.stringify({ id: invoiceId }),
        signal: controller.signal,
      });
      const bodyText = await response.text();

      return {
        status: response.status,
        bodyText,
        latencyMs: Date.now() - start,
      };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new InvoiceApiTimeoutError(this.config.timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
