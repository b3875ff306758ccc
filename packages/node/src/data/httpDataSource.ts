/**
 * packages/node/src/data/httpDataSource.ts — Remote data source over HTTP.
 *
 * Why: Maps a remote request `{ source, params }` onto
 * `GET <baseUrl>/<source>?<params>` and resolves with the parsed JSON body.
 * Non-2xx responses reject, which the renderer turns into a RemoteFetchError
 * value at the binding's target path.
 */

import type { RemoteDataSource, RemoteRequest } from "@trellis-ui/core";

export type HttpResponseLike = Readonly<{
  ok: boolean;
  status: number;
  statusText: string;
  json: () => Promise<unknown>;
}>;

export type FetchLike = (
  url: string,
  init: Readonly<{ method: "GET"; headers: Record<string, string> }>,
) => Promise<HttpResponseLike>;

export type HttpDataSourceOptions = Readonly<{
  baseUrl: string;
  /** Defaults to the global fetch. */
  fetch?: FetchLike;
  headers?: Readonly<Record<string, string>>;
}>;

function paramText(value: unknown): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  return JSON.stringify(value) ?? null;
}

/** URL for a request. Params are sorted by name; null and undefined params are omitted. */
export function requestUrl(baseUrl: string, request: RemoteRequest): string {
  const base = baseUrl.replace(/\/+$/u, "");
  const source = request.source
    .split("/")
    .filter((segment) => segment.length > 0)
    .map(encodeURIComponent)
    .join("/");
  const query = new URLSearchParams();
  for (const name of Object.keys(request.params).sort()) {
    const text = paramText(request.params[name]);
    if (text !== null) query.append(name, text);
  }
  const qs = query.toString();
  return qs.length > 0 ? `${base}/${source}?${qs}` : `${base}/${source}`;
}

export function createHttpDataSource(opts: HttpDataSourceOptions): RemoteDataSource {
  if (typeof opts.baseUrl !== "string" || opts.baseUrl.trim().length === 0) {
    throw new Error("createHttpDataSource: baseUrl must be a non-empty string");
  }
  const doFetch: FetchLike = opts.fetch ?? ((url, init) => fetch(url, init));
  const headers: Record<string, string> = { accept: "application/json", ...opts.headers };

  return Object.freeze({
    fetch: async (request: RemoteRequest): Promise<unknown> => {
      const url = requestUrl(opts.baseUrl, request);
      const res = await doFetch(url, { method: "GET", headers: { ...headers } });
      if (!res.ok) {
        throw new Error(`GET ${url} failed: ${String(res.status)} ${res.statusText}`.trimEnd());
      }
      return res.json();
    },
  });
}
