import { appendFileSync, mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";
import { logWarn } from "./log";

export type Coordinates = { lat: number; lng: number };

export const DEFAULT_CACHE_PATH = ".zip_cache";

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function readCache(cachePath: string): string | null {
  try {
    return readFileSync(cachePath, "utf-8");
  } catch (err) {
    // No cache yet is the normal first-run state.
    if (isNotFound(err)) return null;
    throw err;
  }
}

/**
 * First line of `zip,lat,lng` whose zip field equals `zip`, or null.
 * The file is append-only, so older duplicates win.
 */
export function lookupCachedCoordinates(cachePath: string, zip: string): Coordinates | null {
  const raw = readCache(cachePath);
  if (raw == null) return null;
  for (const line of raw.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    const [key, lat, lng] = trimmed.split(",").map((s) => s.trim());
    if (key !== zip) continue;
    const coords = { lat: Number.parseFloat(lat ?? ""), lng: Number.parseFloat(lng ?? "") };
    if (!Number.isFinite(coords.lat) || !Number.isFinite(coords.lng)) {
      logWarn(`Ignoring malformed cache line in ${cachePath}: ${trimmed}`);
      continue;
    }
    return coords;
  }
  return null;
}

export function formatCacheLine(zip: string, coords: Coordinates): string {
  return `${zip},${coords.lat},${coords.lng}\n`;
}

export function storeCachedCoordinates(cachePath: string, zip: string, coords: Coordinates): void {
  mkdirSync(dirname(cachePath), { recursive: true });
  appendFileSync(cachePath, formatCacheLine(zip, coords), "utf-8");
}
