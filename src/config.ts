import { validateDelivery } from "./deliver";
import { type Env, getEnv } from "./env";
import { ConfigError } from "./errors";
import { DEFAULT_GEO_API_URL } from "./geocode";
import { DEFAULT_PERIODS, MAX_PERIODS, MIN_PERIODS, type RenderStyle } from "./render";
import { parseWebhookList } from "./webhook";
import { DEFAULT_NWS_API_URL } from "./weather-gov";
import { DEFAULT_CACHE_PATH } from "./zip-cache";

export interface RunConfig {
  zip: string;
  limit: number;
  style: RenderStyle;
  narrationKey?: string;
  webhooks: string[];
  cachePath: string;
  geoApiUrl: string;
  nwsApiUrl: string;
}

export const USAGE = `
zipcast - weather.gov forecast for a US ZIP code

Usage: zipcast <zip_code> [limit] [options]

Options:
  -l, --limit <n>          Number of forecast periods, ${MIN_PERIODS}-${MAX_PERIODS} (default ${DEFAULT_PERIODS})
  -m, --markdown           Markdown output
  -k, --narration-key <k>  OpenAI API key; narrates the forecast as audio (needs --webhook)
  -w, --webhook <urls>     Comma-separated webhook URLs to post to (repeatable)
  -c, --cache <path>       Coordinate cache file (default ${DEFAULT_CACHE_PATH})
  -h, --help               Show this help

Examples:
  zipcast 90210
  zipcast 90210 4 --markdown
  zipcast 43130 -k "$OPENAI_API_KEY" -w https://chat.example.com/hooks/abc
`;

export function isHelpRequest(args: readonly string[]): boolean {
  return args.some((a) => a === "-h" || a === "--help");
}

export function parseLimit(raw: string): number {
  const n = /^\d+$/.test(raw.trim()) ? Number.parseInt(raw.trim(), 10) : Number.NaN;
  if (!Number.isInteger(n) || n < MIN_PERIODS || n > MAX_PERIODS) {
    throw new ConfigError(`Limit must be a whole number from ${MIN_PERIODS} to ${MAX_PERIODS}; got "${raw}".`);
  }
  return n;
}

function checkWebhookUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch (err) {
    throw new ConfigError(`Invalid webhook URL: ${raw}`, { cause: err });
  }
  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw new ConfigError(`Webhook URL must be http(s): ${raw}`);
  }
  return raw;
}

/**
 * Turn argv (after the script name) plus ZIPCAST_* env vars into a RunConfig.
 * Command-line values win over env. Throws ConfigError; never touches the network.
 */
export function parseArgs(args: readonly string[], env: Env = process.env): RunConfig {
  const positional: string[] = [];
  let limitRaw: string | undefined;
  let markdown = false;
  let narrationKey: string | undefined;
  let cachePath: string | undefined;
  const webhookArgs: string[] = [];

  const valueFor = (flag: string, i: number): string => {
    const v = args[i + 1];
    if (v == null || v === "") throw new ConfigError(`Option ${flag} needs a value.`);
    return v;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    switch (arg) {
      case "-l":
      case "--limit":
        limitRaw = valueFor(arg, i);
        i++;
        break;
      case "-m":
      case "--markdown":
        markdown = true;
        break;
      case "-k":
      case "--narration-key":
        narrationKey = valueFor(arg, i);
        i++;
        break;
      case "-w":
      case "--webhook":
        webhookArgs.push(valueFor(arg, i));
        i++;
        break;
      case "-c":
      case "--cache":
        cachePath = valueFor(arg, i);
        i++;
        break;
      default:
        if (arg.startsWith("-") && arg.length > 1) throw new ConfigError(`Unknown option: ${arg}`);
        positional.push(arg);
    }
  }

  const [zipRaw, positionalLimit, ...extra] = positional;
  const zip = zipRaw?.trim();
  if (!zip) throw new ConfigError("Missing ZIP code.");
  if (extra.length > 0) throw new ConfigError(`Unexpected argument: ${extra[0]}`);
  if (positionalLimit != null && limitRaw != null) {
    throw new ConfigError("Give the limit either positionally or with --limit, not both.");
  }

  const limitSource = limitRaw ?? positionalLimit;
  const limit = limitSource != null ? parseLimit(limitSource) : DEFAULT_PERIODS;

  const webhookSource = webhookArgs.length > 0 ? webhookArgs : [getEnv("ZIPCAST_WEBHOOK_URLS", env) ?? ""];
  const webhooks = webhookSource.flatMap(parseWebhookList).map(checkWebhookUrl);
  const key = narrationKey?.trim() || getEnv("ZIPCAST_NARRATION_KEY", env);

  validateDelivery(key != null, webhooks);

  return {
    zip,
    limit,
    style: markdown ? "markdown" : "plain",
    narrationKey: key,
    webhooks,
    cachePath: cachePath ?? getEnv("ZIPCAST_CACHE_PATH", env) ?? DEFAULT_CACHE_PATH,
    geoApiUrl: getEnv("ZIPCAST_GEO_API_URL", env) ?? DEFAULT_GEO_API_URL,
    nwsApiUrl: getEnv("ZIPCAST_NWS_API_URL", env) ?? DEFAULT_NWS_API_URL,
  };
}
