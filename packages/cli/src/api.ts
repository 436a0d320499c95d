import type { Config } from "./config.js";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code?: string
  ) {
    super(code ? `${message} (${code})` : message);
    this.name = "ApiError";
  }
}

type ErrorBody = { error?: { message?: unknown; code?: unknown } };

function isErrorBody(value: unknown): value is ErrorBody {
  return typeof value === "object" && value !== null && "error" in value;
}

/** Calls the operator API with the configured bearer token and returns parsed JSON. */
export async function apiFetch(
  cfg: Config,
  opts: { path: string; method?: string; body?: unknown },
  fetchFn: FetchLike = (input, init) => fetch(input, init)
): Promise<unknown> {
  const url = new URL(opts.path, cfg.apiUrl).toString();

  const res = await fetchFn(url, {
    method: opts.method ?? "GET",
    headers: {
      "content-type": "application/json",
      authorization: `Bearer ${cfg.apiKey}`,
    },
    body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
  });

  const text = await res.text();
  const json: unknown = text ? JSON.parse(text) : null;
  if (!res.ok) {
    const err = isErrorBody(json) ? json.error : undefined;
    const message = typeof err?.message === "string" ? err.message : `HTTP ${res.status}`;
    const code = typeof err?.code === "string" ? err.code : undefined;
    throw new ApiError(message, res.status, code);
  }

  return json;
}
