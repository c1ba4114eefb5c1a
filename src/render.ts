import type { ForecastPeriod, Location } from "./weather-gov";

export type RenderStyle = "plain" | "markdown";

export const MIN_PERIODS = 1;
export const MAX_PERIODS = 20;
export const DEFAULT_PERIODS = 14;

/** Checked in order; the first keyword found in the short forecast picks the icon. */
export const FORECAST_ICONS: ReadonlyArray<{ keyword: string; icon: string }> = [
  { keyword: "sunny", icon: "☀️" },
  { keyword: "clear", icon: "🌙" },
  { keyword: "cloudy", icon: "☁️" },
  { keyword: "rain", icon: "🌧️" },
  { keyword: "thunder", icon: "⛈️" },
  { keyword: "t-storm", icon: "⛈️" },
  { keyword: "snow", icon: "❄️" },
  { keyword: "fog", icon: "🌫️" },
];

export const UNKNOWN_ICON = "❓";

export function forecastIcon(shortForecast: string): string {
  const text = shortForecast.toLowerCase();
  return FORECAST_ICONS.find((entry) => text.includes(entry.keyword))?.icon ?? UNKNOWN_ICON;
}

export function forecastHeader(location: Location): string {
  return `Weather forecast for ${location.city}, ${location.state} (${location.radarStation}):`;
}

function temperatureLabel(p: ForecastPeriod): string {
  return `${p.temperature}°${p.temperatureUnit}`;
}

function plainBlock(p: ForecastPeriod): string {
  return `${p.name}: ${forecastIcon(p.shortForecast)} ${temperatureLabel(p)} - ${p.detailedForecast}`;
}

function markdownBlock(p: ForecastPeriod): string {
  return `**${p.name}** ${forecastIcon(p.shortForecast)} ${temperatureLabel(p)}\n${p.detailedForecast}`;
}

export function renderForecast(
  location: Location,
  periods: readonly ForecastPeriod[],
  limit: number,
  style: RenderStyle = "plain"
): string {
  const shown = periods.slice(0, limit);
  const header = forecastHeader(location);
  if (style === "markdown") {
    return [`**${header}**`, ...shown.map(markdownBlock)].join("\n\n");
  }
  return [header, ...shown.map(plainBlock)].join("\n");
}
