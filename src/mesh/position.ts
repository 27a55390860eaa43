export type Coordinates = {
  lat: number;
  lon: number;
};

const LAT_KEYS = ["lat", "latitude", "latitudeI", "latitude_i"] as const;
const LON_KEYS = ["lon", "lng", "longitude", "longitudeI", "longitude_i"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

// Integer fields arrive in 1e-7 degrees.
function scaleCoordinate(value: number): number {
  return Math.abs(value) > 1000 ? value / 1e7 : value;
}

function readCoordinate(scope: Record<string, unknown>, keys: readonly string[]): number | undefined {
  for (const key of keys) {
    const value = scope[key];
    if (typeof value === "number" && Number.isFinite(value)) {
      return scaleCoordinate(value);
    }
  }
  return undefined;
}

/**
 * Finds coordinate-shaped fields at the top level, under `payload`, or under
 * `payload.decoded`. Zero is a valid coordinate.
 */
export function extractPosition(packet: Record<string, unknown>): Coordinates | null {
  const payload = isRecord(packet.payload) ? packet.payload : undefined;
  const decoded = payload && isRecord(payload.decoded) ? payload.decoded : undefined;
  for (const scope of [packet, payload, decoded]) {
    if (!scope) {
      continue;
    }
    const lat = readCoordinate(scope, LAT_KEYS);
    const lon = readCoordinate(scope, LON_KEYS);
    if (lat !== undefined && lon !== undefined) {
      return { lat, lon };
    }
  }
  return null;
}

export function formatCoordinates(lat: number, lon: number): string {
  return `${lat.toFixed(4)},${lon.toFixed(4)}`;
}
