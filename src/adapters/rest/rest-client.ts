/**
 * REST client -- typed wrapper around fetch for the lighting control plane.
 *
 * The client is stateless with respect to the server address: every request
 * names its base URL, so a backend can swap its session record in one step.
 */

import type { z } from "zod";
import { RESULT_CODES } from "../../core/result-code.js";
import { BackendCallError, InvalidStateError } from "../../errors.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface RestRequest<T> {
  baseUrl: string;
  method: HttpMethod;
  path: string;
  body?: unknown;
  /** Shape of a usable body; anything else is reported as `data: null`. */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export interface RestResponse<T> {
  /** Transport-level success (2xx). */
  ok: boolean;
  status: number;
  /** Absolute URL the request went to. */
  url: string;
  /** Parsed body, or null when it was empty, not JSON or not the expected shape. */
  data: T | null;
}

export interface RestClientOptions {
  /** Per-request timeout; a timed-out request fails like any transport error. */
  requestTimeoutMs: number;
}

export class RestClient {
  private readonly requestTimeoutMs: number;
  private closed = false;

  constructor(options: RestClientOptions) {
    this.requestTimeoutMs = options.requestTimeoutMs;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Refuse new requests. Requests already in flight run to completion. */
  close(): void {
    this.closed = true;
  }

  /**
   * Send one request. Resolves for every HTTP status, so callers can check the
   * transport flag and the logical result separately; rejects with
   * `BackendCallError` only when no response arrived at all.
   */
  async request<T>(request: RestRequest<T>): Promise<RestResponse<T>> {
    if (this.closed) {
      throw new InvalidStateError(`${request.method} ${request.path}`, "disposed");
    }

    // Paths are appended, not resolved: session URIs may carry a path prefix.
    const url = `${request.baseUrl.replace(/\/$/, "")}${request.path}`;
    const headers: Record<string, string> = { Accept: "application/json" };
    const init: RequestInit = {
      method: request.method,
      headers,
      signal: AbortSignal.timeout(this.requestTimeoutMs),
    };
    if (request.body !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(request.body);
    }

    let res: Response;
    let text: string;
    try {
      res = await globalThis.fetch(url, init);
      text = await res.text();
    } catch (err) {
      throw new BackendCallError(
        `${request.method} ${url} failed: ${err instanceof Error ? err.message : String(err)}`,
        { endpoint: url, method: request.method, resultCode: RESULT_CODES.failed },
        { cause: err },
      );
    }

    return { ok: res.ok, status: res.status, url, data: parseBody(text, request.schema) };
  }
}

function parseBody<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  if (!text) return null;
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = schema.safeParse(json);
  return parsed.success ? parsed.data : null;
}
