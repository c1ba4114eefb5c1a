import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { UpstreamError } from "../src/errors";
import { resolveCoordinates } from "../src/geocode";
import { createHttpClient } from "../src/http";
import { GEO_URL_90210, fixture, jsonResponse, recordingSleep, routeFetch, silenceStderr } from "./helpers";

describe("resolveCoordinates", () => {
  let dir: string;
  let cachePath: string;
  let stderr: ReturnType<typeof silenceStderr>;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "zipcast-geo-"));
    cachePath = join(dir, ".zip_cache");
    stderr = silenceStderr();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("uses a cached entry without calling the geo API", async () => {
    writeFileSync(cachePath, "90210,34.1,-118.4\n");
    const { fetchImpl } = routeFetch({});
    const coords = await resolveCoordinates("90210", { cachePath, http: createHttpClient({ fetchImpl }) });
    expect(coords).toEqual({ lat: 34.1, lng: -118.4 });
    expect(fetchImpl).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledWith("[zipcast] Using cached coordinates.");
  });

  it("geocodes a miss, appends one cache line, and hits the cache next time", async () => {
    const { fetchImpl } = routeFetch({ [GEO_URL_90210]: () => jsonResponse(fixture("zippopotam-90210.json")) });
    const http = createHttpClient({ fetchImpl });

    await expect(resolveCoordinates("90210", { cachePath, http })).resolves.toEqual({ lat: 34.09, lng: -118.41 });
    expect(readFileSync(cachePath, "utf-8")).toBe("90210,34.09,-118.41\n");
    expect(stderr).toHaveBeenCalledWith("[zipcast] Getting coordinates from geo API.");

    await expect(resolveCoordinates("90210", { cachePath, http })).resolves.toEqual({ lat: 34.09, lng: -118.41 });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(readFileSync(cachePath, "utf-8")).toBe("90210,34.09,-118.41\n");
  });

  it("honors a custom geo API base URL", async () => {
    const { fetchImpl, calls } = routeFetch({
      "https://geo.example.test/us/43130": () =>
        jsonResponse({ places: [{ latitude: "39.6", longitude: "-82.9" }] }),
    });
    const coords = await resolveCoordinates("43130", {
      cachePath,
      http: createHttpClient({ fetchImpl }),
      geoApiUrl: "https://geo.example.test/us/",
    });
    expect(coords).toEqual({ lat: 39.6, lng: -82.9 });
    expect(calls.map((c) => c.url)).toEqual(["https://geo.example.test/us/43130"]);
  });

  it("fails on zero results and writes nothing", async () => {
    const { fetchImpl } = routeFetch({
      "https://api.zippopotam.us/us/00000": () => jsonResponse({ "post code": "00000", places: [] }),
    });
    const err = await resolveCoordinates("00000", { cachePath, http: createHttpClient({ fetchImpl }) }).catch(
      (e: unknown) => e
    );
    expect(err).toBeInstanceOf(UpstreamError);
    expect(String(err)).toContain("No place found for ZIP 00000");
    expect(existsSync(cachePath)).toBe(false);
  });

  it("fails on an unknown ZIP answered with 404 and writes nothing", async () => {
    const { fetchImpl } = routeFetch({ "https://api.zippopotam.us/us/abcde": () => jsonResponse({}, 404) });
    const { sleep } = recordingSleep();
    const err = await resolveCoordinates("abcde", { cachePath, http: createHttpClient({ fetchImpl, sleep }) }).catch(
      (e: unknown) => e
    );
    expect(err).toMatchObject({ status: 404 });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(existsSync(cachePath)).toBe(false);
  });
});
