import { parseArgs } from "../config";
import { type DeliveryResult, deliver } from "../deliver";
import { type Env } from "../env";
import { resolveCoordinates } from "../geocode";
import { type FetchLike, type Sleep, createHttpClient } from "../http";
import { type Narrator, createOpenAiNarrator, readNarratorConfig } from "../narration";
import { renderForecast } from "../render";
import { fetchForecast } from "../weather-gov";

/** Seams for the outside world; tests replace them, the CLI takes the defaults. */
export interface ForecastDeps {
  env: Env;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
  signal?: AbortSignal;
  stdout: (text: string) => void;
  createNarrator: (apiKey: string) => Narrator;
  tmpRoot?: string;
}

function defaultDeps(env: Env): ForecastDeps {
  return {
    env,
    stdout: (text) => process.stdout.write(`${text}\n`),
    createNarrator: (apiKey) => createOpenAiNarrator(readNarratorConfig(apiKey, env)),
  };
}

/** zip → coordinates → forecast → text → console or webhooks. */
export async function runForecast(args: string[], overrides: Partial<ForecastDeps> = {}): Promise<DeliveryResult> {
  const deps: ForecastDeps = { ...defaultDeps(overrides.env ?? process.env), ...overrides };
  const config = parseArgs(args, deps.env);
  // Narrator settings are part of the config: a bad voice fails here, before any request.
  const narrator = config.narrationKey ? deps.createNarrator(config.narrationKey) : undefined;

  const http = createHttpClient({ fetchImpl: deps.fetchImpl, sleep: deps.sleep, signal: deps.signal });
  const coords = await resolveCoordinates(config.zip, {
    cachePath: config.cachePath,
    http,
    geoApiUrl: config.geoApiUrl,
  });
  const { location, periods } = await fetchForecast(coords, { http, nwsApiUrl: config.nwsApiUrl });
  const text = renderForecast(location, periods, config.limit, config.style);

  return deliver(text, {
    narrator,
    webhooks: config.webhooks,
    http,
    stdout: deps.stdout,
    signal: deps.signal,
    tmpRoot: deps.tmpRoot,
  });
}
