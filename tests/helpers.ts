import { readFileSync } from "node:fs";
import { join } from "node:path";
import { vi } from "vitest";

const FIXTURES = join(__dirname, "fixtures");

export const GEO_URL_90210 = "https://api.zippopotam.us/us/90210";
export const POINTS_URL_90210 = "https://api.weather.gov/points/34.0900,-118.4100";
export const FORECAST_URL_90210 = "https://api.weather.gov/gridpoints/LOX/149,48/forecast";

export function fixture(name: string): unknown {
  return JSON.parse(readFileSync(join(FIXTURES, name), "utf-8"));
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

export type Route = (init?: RequestInit) => Response | Promise<Response>;

/** fetch stand-in answering only the given URLs; anything else rejects. */
export function routeFetch(routes: Record<string, Route>) {
  const calls: Array<{ url: string; init?: RequestInit }> = [];
  const fetchImpl = vi.fn(async (url: string, init?: RequestInit): Promise<Response> => {
    calls.push({ url, init });
    const route = routes[url];
    if (!route) throw new Error(`unexpected request: ${url}`);
    return route(init);
  });
  return { fetchImpl, calls };
}

/** Routes for a full 90210 lookup: geocode, NWS points, NWS forecast. */
export function routes90210(): Record<string, Route> {
  return {
    [GEO_URL_90210]: () => jsonResponse(fixture("zippopotam-90210.json")),
    [POINTS_URL_90210]: () => jsonResponse(fixture("nws-points-90210.json")),
    [FORECAST_URL_90210]: () => jsonResponse(fixture("nws-forecast-90210.json")),
  };
}

/** Records requested delays and returns at once. */
export function recordingSleep() {
  const delays: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    delays.push(ms);
  };
  return { sleep, delays };
}

export function silenceStderr() {
  return vi.spyOn(console, "error").mockImplementation(() => {});
}
