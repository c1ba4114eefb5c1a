import { UpstreamError } from "./errors";
import type { HttpClient } from "./http";
import { logInfo } from "./log";
import { type Coordinates, lookupCachedCoordinates, storeCachedCoordinates } from "./zip-cache";

export const DEFAULT_GEO_API_URL = "https://api.zippopotam.us/us";

export interface GeocodeOptions {
  cachePath: string;
  http: HttpClient;
  geoApiUrl?: string;
}

type ZippopotamResponse = {
  places?: Array<{ latitude?: string; longitude?: string; "place name"?: string }>;
};

/** Resolve US ZIP to lat/lng via zippopotam.us (no key). */
export async function getCoordinatesFromGeoApi(
  zip: string,
  http: HttpClient,
  geoApiUrl: string = DEFAULT_GEO_API_URL
): Promise<Coordinates> {
  const url = `${geoApiUrl.replace(/\/+$/, "")}/${encodeURIComponent(zip)}`;
  const data = (await http.getJson(url)) as ZippopotamResponse | null;
  const place = data?.places?.[0];
  if (!place) throw new UpstreamError(`No place found for ZIP ${zip}`, url);
  const lat = Number.parseFloat(place.latitude ?? "");
  const lng = Number.parseFloat(place.longitude ?? "");
  if (!Number.isFinite(lat) || !Number.isFinite(lng)) {
    throw new UpstreamError(`Geo API returned no usable coordinates for ZIP ${zip}`, url);
  }
  return { lat, lng };
}

/** Cache first, then the geo API. A fresh lookup is appended to the cache. */
export async function resolveCoordinates(zip: string, options: GeocodeOptions): Promise<Coordinates> {
  const cached = lookupCachedCoordinates(options.cachePath, zip);
  if (cached) {
    logInfo("Using cached coordinates.");
    return cached;
  }
  logInfo("Getting coordinates from geo API.");
  const coords = await getCoordinatesFromGeoApi(zip, options.http, options.geoApiUrl);
  storeCachedCoordinates(options.cachePath, zip, coords);
  return coords;
}
