import { describe, it, expect, vi } from "vitest";
import { InvoiceApiClient, InvoiceApiTimeoutError } from "../../../http/invoice-api-client.js";

describe("InvoiceApiClient", () => {
  it("should derive the endpoint from the base URL host", () => {
    const client = new InvoiceApiClient({ baseUrl: "https://api.invoices.test:8443/v1/invoices/", timeoutMs: 1000 });

    expect(client.endpoint).toBe("api.invoices.test:8443");
    expect(client.urlFor("a/b 1")).toBe("https://api.invoices.test:8443/v1/invoices/a%2Fb%201");
  });

  it("should post the invoice id with the bearer token", async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(
      new Response('{"status":"COMPLETED"}', { status: 200 })
    );
    const client = new InvoiceApiClient({ baseUrl: "http://invoice-api.test/invoices", timeoutMs: 1000 }, fetchFn);

    const response = await client.submit("42", "test-token");

    expect(response.status).toBe(200);
    expect(response.bodyText).toBe('{"status":"COMPLETED"}');

    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe("http://invoice-api.test/invoices/42");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"id":"42"}');
    expect(init?.headers).toMatchObject({ Authorization: "Bearer test-token" });
  });

  it("should resolve with error statuses instead of throwing", async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(new Response("busy", { status: 503 }));
    const client = new InvoiceApiClient({ baseUrl: "http://invoice-api.test/invoices", timeoutMs: 1000 }, fetchFn);

    expect((await client.submit("1", "test-token")).status).toBe(503);
  });

  it("should raise a timeout error when the request is aborted", async () => {
    const fetchFn = vi.fn<typeof fetch>().mockImplementation(
      (_input, init) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );
    const client = new InvoiceApiClient({ baseUrl: "http://invoice-api.test/invoices", timeoutMs: 10 }, fetchFn);

    await expect(client.submit("1", "test-token")).rejects.toBeInstanceOf(InvoiceApiTimeoutError);
  });

  it("should pass through network errors", async () => {
    const fetchFn = vi.fn<typeof fetch>().mockRejectedValue(new TypeError("fetch failed"));
    const client = new InvoiceApiClient({ baseUrl: "http://invoice-api.test/invoices", timeoutMs: 1000 }, fetchFn);

    await expect(client.submit("1", "test-token")).rejects.toThrow("fetch failed");
  });
});
