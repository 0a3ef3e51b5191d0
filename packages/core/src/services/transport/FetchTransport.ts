import { STATUS_CODES } from "node:http";
import { request as undiciRequest } from "undici";
import { createTransportError, type HeaderMap, type PreparedRequest } from "@reqdeck/shared";
import type { Transport, TransportResponse } from "./Transport.js";

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface FetchTransportOptions {
  timeoutMs?: number;
}

const hasHeader = (headers: HeaderMap, name: string): boolean =>
  Object.keys(headers).some((key) => key.toLowerCase() === name.toLowerCase());

export class FetchTransport implements Transport {
  private readonly timeoutMs: number;

  constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async send(request: PreparedRequest): Promise<TransportResponse> {
    const headers: HeaderMap = { ...request.headers };
    let body: string | undefined;
    if (request.body !== undefined) {
      body = JSON.stringify(request.body);
      if (!hasHeader(headers, "content-type")) {
        headers["Content-Type"] = "application/json";
      }
    }
    try {
      const method = request.method;
      if (body !== undefined && (method === "GET" || method === "HEAD")) {
        return await this.sendWithBody(method, request.url, headers, body);
      }
      const response = await fetch(request.url, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      const buffer = Buffer.from(await response.arrayBuffer());
      const responseHeaders: HeaderMap = {};
      response.headers.forEach((value, key) => {
        responseHeaders[key] = value;
      });
      return {
        status: response.status,
        reasonPhrase: response.statusText || STATUS_CODES[response.status] || "",
        headers: responseHeaders,
        rawBody: buffer.toString("utf8"),
        byteLength: buffer.byteLength,
      };
    } catch (error) {
      throw createTransportError({ method: request.method, url: request.url, cause: error });
    }
  }

  /** fetch refuses a GET or HEAD body, so those go through undici's lower-level client. */
  private async sendWithBody(method: "GET" | "HEAD", url: string, headers: HeaderMap, body: string): Promise<TransportResponse> {
    const response = await undiciRequest(url, {
      method,
      headers,
      body,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    const buffer = Buffer.from(await response.body.arrayBuffer());
    const responseHeaders: HeaderMap = {};
    for (const [key, value] of Object.entries(response.headers)) {
      if (value === undefined) continue;
      responseHeaders[key] = Array.isArray(value) ? value.join(", ") : value;
    }
    return {
      status: response.statusCode,
      reasonPhrase: STATUS_CODES[response.statusCode] ?? "",
      headers: responseHeaders,
      rawBody: buffer.toString("utf8"),
      byteLength: buffer.byteLength,
    };
  }
}
