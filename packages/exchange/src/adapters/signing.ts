import { createHmac } from "node:crypto";

export type HttpMethod = "GET" | "POST" | "DELETE";
export type ParamValue = string | number | boolean;
export type Params = Record<string, ParamValue>;

/** `k=v&…` sorted by key, values unencoded. The exchange signs exactly this string. */
export function canonicalQuery(params: Params): string {
  return Object.keys(params)
    .sort()
    .map((k) => `${k}=${params[k]}`)
    .join("&");
}

/** Compact JSON with keys in sorted order, or "" when there are no params. */
export function compactBody(params: Params): string {
  const keys = Object.keys(params).sort();
  if (keys.length === 0) return "";
  const sorted: Params = {};
  for (const k of keys) sorted[k] = params[k];
  return JSON.stringify(sorted);
}

/** METHOD + path (+ "?" + query when non-empty) (+ body for POST/DELETE). */
export function buildSignString(method: HttpMethod, path: string, query: string, body: string): string {
  const pathWithQuery = query ? `${path}?${query}` : path;
  return method === "GET" ? `${method}${pathWithQuery}` : `${method}${pathWithQuery}${body}`;
}

export function sign(secret: string, payload: string): string {
  return createHmac("sha256", secret).update(payload).digest("hex");
}

export interface SignedRequest {
  /** Query string to put on the URL. */
  query: string;
  /** Request body, "" for GET. */
  body: string;
  signature: string;
}

/**
 * Sign a request. `timestamp` joins the params; GET sends everything in the
 * query, POST/DELETE send the params as body and only the timestamp in the query.
 */
export function signRequest(secret: string, method: HttpMethod, path: string, params: Params, timestamp: number): SignedRequest {
  const withTs: Params = { ...params, timestamp };
  const fullQuery = canonicalQuery(withTs);

  if (method === "GET") {
    return { query: fullQuery, body: "", signature: sign(secret, buildSignString(method, path, fullQuery, "")) };
  }

  const body = compactBody(withTs);
  return {
    query: `timestamp=${timestamp}`,
    body,
    signature: sign(secret, buildSignString(method, path, fullQuery, body)),
  };
}
