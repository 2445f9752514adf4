/**
 * Credential exchange against the identity endpoint (password grant).
 */

import { z } from "zod";
import {
  AuthenticationRejectedError,
  CredentialFetchTimeoutError,
  InvalidCredentialResponseError,
} from "../errors.js";
import type { Credential } from "../types/index.js";

export interface TokenClientConfig {
  tokenUrl: string;
  clientId: string;
  username: string;
  password: string;
  timeoutMs: number;
}

/**
 * Anything able to mint a fresh credential
 */
export interface CredentialSource {
  fetchCredential(): Promise<Credential>;
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().int().positive(),
});

export class PasswordGrantTokenClient implements CredentialSource {
  constructor(
    private readonly config: TokenClientConfig,
    private readonly fetchFn: typeof fetch = fetch,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * @throws {AuthenticationRejectedError} non-2xx answer
   * @throws {InvalidCredentialResponseError} unusable 2xx body
   * @throws {CredentialFetchTimeoutError} timeout or network failure
   */
  async fetchCredential(): Promise<Credential> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    let response: Response;
    let bodyText: string;
    try {
      response = await this.fetchFn(this.config.tokenUrl, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams({
          grant_type: "password",
          client_id: this.config.clientId,
          username: this.config.username,
          password: this.config.password,
        }),
        signal: controller.signal,
      });
      bodyText = await response.text();
    } catch (error) {
      throw new CredentialFetchTimeoutError(this.config.timeoutMs, error);
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      throw new AuthenticationRejectedError(response.status, { tokenUrl: this.config.tokenUrl });
    }

    let json: unknown;
    try {
      json = JSON.parse(bodyText);
    } catch {
      throw new InvalidCredentialResponseError("body is not JSON");
    }

    const parsed = tokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
      throw new InvalidCredentialResponseError(`missing or invalid fields: ${fields}`);
    }

    return {
      token: parsed.data.access_token,
      expiresAt: this.now() + parsed.data.expires_in * 1000,
    };
  }
}
