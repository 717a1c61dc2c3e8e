import got from "got";
import type { HttpMethod } from "./signing.js";

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string | string[] | undefined>;
  body: string;
}

/** One HTTP round trip. Throws only for transport failures; any status comes back as a response. */
export type HttpTransport = (req: HttpRequest) => Promise<HttpResponse>;

export const gotTransport: HttpTransport = async (req) => {
  const res = await got(req.url, {
    method: req.method,
    headers: req.headers,
    body: req.body ? req.body : undefined,
    timeout: { request: req.timeoutMs },
    retry: { limit: 0 },
    throwHttpErrors: false,
    signal: req.signal,
  });
  return { status: res.statusCode, headers: res.headers, body: res.body };
};
