import type { Coordinates } from "../mesh/position.js";
import { formatErrorMessage } from "../infra/errors.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/subsystem.js";
import { formatCoordinates } from "../mesh/position.js";
import { createNominatimClient, type GeocodedPlace } from "./nominatim.js";
import { fetchOpenMeteoForecast, type Forecast } from "./open-meteo.js";

export type { Forecast } from "./open-meteo.js";
export type { GeocodedPlace } from "./nominatim.js";

export type WeatherBackend = {
  /** `lat,lon` or a place name; null when it cannot be resolved. */
  resolveLocation: (query: string) => Promise<GeocodedPlace | null>;
  reverseLabel: (lat: number, lon: number) => Promise<string | null>;
  fetchForecast: (lat: number, lon: number) => Promise<Forecast>;
};

export type WeatherBackendOptions = {
  userAgent: string;
  timeoutMs: number;
  fetchFn?: typeof fetch;
  now?: () => number;
  log?: SubsystemLogger;
};

const DECIMAL_RE = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)$/;

/** Accepts `lat,lon` in decimal degrees; anything else is a place name. */
export function parseCoordinates(query: string): Coordinates | null {
  const parts = query.split(",").map((part) => part.trim());
  if (parts.length !== 2) {
    return null;
  }
  const [latText = "", lonText = ""] = parts;
  if (!DECIMAL_RE.test(latText) || !DECIMAL_RE.test(lonText)) {
    return null;
  }
  const lat = Number(latText);
  const lon = Number(lonText);
  if (Math.abs(lat) > 90 || Math.abs(lon) > 180) {
    return null;
  }
  return { lat, lon };
}

export function createWeatherBackend(opts: WeatherBackendOptions): WeatherBackend {
  const log = opts.log ?? createSubsystemLogger("weather");
  const nominatim = createNominatimClient({
    userAgent: opts.userAgent,
    timeoutMs: opts.timeoutMs,
    fetchFn: opts.fetchFn,
  });

  const resolveLocation = async (query: string): Promise<GeocodedPlace | null> => {
    const trimmed = query.trim();
    if (!trimmed) {
      return null;
    }
    const coords = parseCoordinates(trimmed);
    if (coords) {
      let label: string | null = null;
      try {
        label = await nominatim.reverse(coords.lat, coords.lon);
      } catch (err) {
        log.warn("reverse geocode failed", { error: formatErrorMessage(err) });
      }
      return { ...coords, label: label ?? formatCoordinates(coords.lat, coords.lon) };
    }
    const place = await nominatim.search(trimmed);
    if (!place) {
      log.debug("no geocoding result", { query: trimmed });
    }
    return place;
  };

  return {
    resolveLocation,
    reverseLabel: (lat, lon) => nominatim.reverse(lat, lon),
    fetchForecast: (lat, lon) =>
      fetchOpenMeteoForecast({
        lat,
        lon,
        timeoutMs: opts.timeoutMs,
        now: opts.now,
        fetchFn: opts.fetchFn,
      }),
  };
}
