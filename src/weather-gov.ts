import { UpstreamError } from "./errors";
import type { HttpClient } from "./http";
import type { Coordinates } from "./zip-cache";

export const DEFAULT_NWS_API_URL = "https://api.weather.gov";

export interface Location {
  city: string;
  state: string;
  radarStation: string;
}

export interface ForecastPeriod {
  name: string;
  temperature: number;
  temperatureUnit: string;
  shortForecast: string;
  detailedForecast: string;
}

export interface Forecast {
  location: Location;
  periods: ForecastPeriod[];
}

export interface ForecastOptions {
  http: HttpClient;
  nwsApiUrl?: string;
}

const GEO_JSON = { Accept: "application/geo+json" };

type PointsResponse = {
  properties?: {
    forecast?: string;
    radarStation?: string;
    relativeLocation?: { properties?: { city?: string; state?: string } };
  };
};

type ForecastResponse = {
  properties?: {
    periods?: Array<{
      name?: string;
      temperature?: number | null;
      temperatureUnit?: string;
      shortForecast?: string;
      detailedForecast?: string;
    }>;
  };
};

/** NWS points API: location descriptor and the grid forecast URL for lat/lng. */
export async function getPoints(
  coords: Coordinates,
  http: HttpClient,
  nwsApiUrl: string = DEFAULT_NWS_API_URL
): Promise<{ location: Location; forecastUrl: string }> {
  const url = `${nwsApiUrl.replace(/\/+$/, "")}/points/${coords.lat.toFixed(4)},${coords.lng.toFixed(4)}`;
  const data = (await http.getJson(url, GEO_JSON)) as PointsResponse | null;
  const props = data?.properties;
  const place = props?.relativeLocation?.properties;
  if (!props?.forecast) throw new UpstreamError("NWS points response is missing the forecast URL", url);
  if (!place?.city || !place.state || !props.radarStation) {
    throw new UpstreamError("NWS points response is missing location details", url);
  }
  return {
    location: { city: place.city, state: place.state, radarStation: props.radarStation },
    forecastUrl: props.forecast,
  };
}

/** Twice-daily periods (Today, Tonight, Monday, Monday Night, ...) from the grid forecast URL. */
export async function getForecastPeriods(forecastUrl: string, http: HttpClient): Promise<ForecastPeriod[]> {
  const data = (await http.getJson(forecastUrl, GEO_JSON)) as ForecastResponse | null;
  const rawPeriods = data?.properties?.periods;
  if (!Array.isArray(rawPeriods)) {
    throw new UpstreamError("NWS forecast response has no periods", forecastUrl);
  }
  return rawPeriods.map((p, i) => {
    if (!p.name || typeof p.temperature !== "number") {
      throw new UpstreamError(`NWS forecast period ${i + 1} is missing its name or temperature`, forecastUrl);
    }
    return {
      name: p.name,
      temperature: p.temperature,
      temperatureUnit: p.temperatureUnit ?? "F",
      shortForecast: p.shortForecast ?? "",
      detailedForecast: p.detailedForecast ?? "",
    };
  });
}

/** Point lookup, then the forecast it points at. Always live; nothing is cached. */
export async function fetchForecast(coords: Coordinates, options: ForecastOptions): Promise<Forecast> {
  const { location, forecastUrl } = await getPoints(coords, options.http, options.nwsApiUrl);
  const periods = await getForecastPeriods(forecastUrl, options.http);
  return { location, periods };
}
