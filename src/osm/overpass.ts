import { NetworkError, isAbortError } from "../errors";
import { createLogger } from "../log";
import { computeBackoffMs, parseRetryAfterMs, RETRYABLE_STATUS, safeReadText, sleep, snippet } from "../net/http";
import { overpassRateLimiter } from "../net/limiters";
import type { RateLimiter } from "../net/rateLimiter";
import type { GeoBounds } from "../types";
import type { OverpassResponse } from "./types";

export const OVERPASS_DEFAULT_ENDPOINT = "https://overpass-api.de/api/interpreter";

const OVERPASS_FALLBACK_ENDPOINTS = [
  OVERPASS_DEFAULT_ENDPOINT,
  "https://overpass.kumi.systems/api/interpreter",
  "https://overpass.private.coffee/api/interpreter"
];

const QUERY_TIMEOUT_S = 90;
const MAX_RETRIES = 2;
const RETRY_BASE_MS = 600;

// Highway values that are not part of the built network.
const EXCLUDED_HIGHWAYS = "abandoned|construction|no|planned|platform|proposed|raceway|razed";

const log = createLogger("overpass");

export interface OverpassRequestOptions {
  endpoint?: string;
  signal?: AbortSignal;
  limiter?: RateLimiter;
}

export interface OverpassResult {
  payload: OverpassResponse;
  endpoint: string;
}

export function buildStreetNetworkQuery(bounds: GeoBounds): string {
  const bbox = formatBounds(bounds);
  return `[out:json][timeout:${QUERY_TIMEOUT_S}];
(
  way["highway"]["area"!~"yes"]["highway"!~"${EXCLUDED_HIGHWAYS}"](${bbox});
);
(._;>;);
out body;`;
}

/** Ways and multipolygon relations matching any of the tag values, with inline geometry. */
export function buildAreaQuery(bounds: GeoBounds, tags: Record<string, string[]>): string {
  const bbox = formatBounds(bounds);
  const clauses: string[] = [];
  for (const [key, values] of Object.entries(tags)) {
    const filter = `["${key}"~"^(${values.join("|")})$"]`;
    clauses.push(`  way${filter}(${bbox});`);
    clauses.push(`  relation["type"="multipolygon"]${filter}(${bbox});`);
  }
  return `[out:json][timeout:${QUERY_TIMEOUT_S}];
(
${clauses.join("\n")}
);
out geom;`;
}

export function formatBounds(bounds: GeoBounds): string {
  return [
    bounds.south.toFixed(6),
    bounds.west.toFixed(6),
    bounds.north.toFixed(6),
    bounds.east.toFixed(6)
  ].join(",");
}

/**
 * Runs a query against the configured endpoint, or walks the public mirrors
 * until one answers.
 */
export async function runOverpassQuery(
  query: string,
  opts: OverpassRequestOptions = {}
): Promise<OverpassResult> {
  const endpointInput = (opts.endpoint ?? "").trim();
  const endpoints = endpointInput ? [endpointInput] : OVERPASS_FALLBACK_ENDPOINTS;
  const limiter = opts.limiter ?? overpassRateLimiter;
  let lastError: Error | null = null;
  for (const endpoint of endpoints) {
    try {
      const payload = await limiter.schedule(() => requestOverpass(endpoint, query, opts.signal), opts.signal);
      return { payload, endpoint };
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      log.warn(`${endpoint} failed:`, error instanceof Error ? error.message : error);
      lastError = error instanceof Error ? error : new Error(String(error));
    }
  }
  throw lastError ?? new NetworkError("Overpass request failed.", 0);
}

async function requestOverpass(
  endpoint: string,
  query: string,
  signal?: AbortSignal
): Promise<OverpassResponse> {
  let attempt = 0;
  while (true) {
    log.debug(`POST ${endpoint} (attempt ${attempt + 1})`);
    let response: Response;
    try {
      response = await fetch(endpoint, {
        method: "POST",
        body: new URLSearchParams({ data: query }),
        headers: {
          "Content-Type": "application/x-www-form-urlencoded; charset=UTF-8"
        },
        signal
      });
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      if (attempt < MAX_RETRIES) {
        await sleep(computeBackoffMs(attempt, null, RETRY_BASE_MS), signal);
        attempt += 1;
        continue;
      }
      throw new NetworkError("Overpass unavailable. Check your network and try again.", 0);
    }

    if (response.ok) {
      let body: unknown;
      try {
        body = await response.json();
      } catch {
        throw new NetworkError("Overpass response was not valid JSON.", response.status);
      }
      return toOverpassResponse(body);
    }

    const retryAfterMs = parseRetryAfterMs(response.headers.get("Retry-After"));
    if (RETRYABLE_STATUS.has(response.status) && attempt < MAX_RETRIES) {
      await sleep(computeBackoffMs(attempt, retryAfterMs, RETRY_BASE_MS), signal);
      attempt += 1;
      continue;
    }

    const detail = await safeReadText(response);
    throw new NetworkError(buildOverpassErrorMessage(response, detail), response.status, retryAfterMs);
  }
}

export function toOverpassResponse(body: unknown): OverpassResponse {
  if (typeof body !== "object" || body === null) {
    throw new NetworkError("Overpass response was not a JSON object.", 0);
  }
  const elements = "elements" in body ? body.elements : undefined;
  const remark = "remark" in body && typeof body.remark === "string" ? body.remark : undefined;
  if (!Array.isArray(elements)) {
    throw new NetworkError(`Overpass response missing elements array.${remark ? ` ${remark}` : ""}`, 0);
  }
  if (remark) {
    log.warn("Overpass remark:", remark);
  }
  return { elements, remark };
}

function buildOverpassErrorMessage(response: Response, detail: string): string {
  if (response.status === 429) {
    return "Overpass rate-limited. Wait a minute and try again.";
  }
  if (response.status === 502 || response.status === 503 || response.status === 504) {
    return "Overpass timed out. Try a smaller distance.";
  }
  const text = snippet(detail);
  return `Overpass request failed (${response.status} ${response.statusText}).${text ? ` ${text}` : ""}`;
}
