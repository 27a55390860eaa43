import { z } from "zod";
import { fetchJsonWithTimeout } from "../utils/fetch-timeout.js";
import { formatCoordinates } from "../mesh/position.js";

export const NOMINATIM_BASE_URL = "https://nominatim.openstreetmap.org";
export const MAX_LABEL_LENGTH = 60;

export type GeocodedPlace = {
  lat: number;
  lon: number;
  label: string;
};

export type NominatimClientOptions = {
  userAgent: string;
  timeoutMs: number;
  baseUrl?: string;
  fetchFn?: typeof fetch;
};

const AddressSchema = z
  .object({
    city: z.string(),
    town: z.string(),
    village: z.string(),
    municipality: z.string(),
    state: z.string(),
    county: z.string(),
    region: z.string(),
    country_code: z.string(),
    country: z.string(),
  })
  .partial()
  .passthrough();

type NominatimAddress = z.infer<typeof AddressSchema>;

const SearchResultSchema = z
  .object({
    lat: z.coerce.number().finite(),
    lon: z.coerce.number().finite(),
    display_name: z.string().optional(),
    address: AddressSchema.optional(),
  })
  .passthrough();

const ReverseResultSchema = z
  .object({
    address: AddressSchema.optional(),
    error: z.string().optional(),
  })
  .passthrough();

/** NFKD, then drop anything outside printable ASCII; mesh clients render little else. */
export function asciiFold(value: string): string {
  return value
    .normalize("NFKD")
    .replace(/[^\x20-\x7e]/g, "")
    .trim();
}

/** `City, CC` with fallbacks; always ASCII and at most `maxLen` characters. */
export function labelFromAddress(
  parts: { city?: string; admin?: string; country?: string },
  fallback = "",
  maxLen = MAX_LABEL_LENGTH,
): string {
  const segments: string[] = [];
  const first = asciiFold(parts.city?.trim() || parts.admin?.trim() || "");
  if (first) {
    segments.push(first);
  }
  const country = parts.country?.trim() ?? "";
  if (country) {
    const upper = country.toUpperCase();
    const folded = upper.length <= 3 ? upper : asciiFold(country);
    if (folded) {
      segments.push(folded);
    }
  }
  let label = segments.join(", ") || asciiFold(fallback) || "unknown location";
  label = label.replace(/^[\s,]+|[\s,]+$/g, "");
  return label.length > maxLen ? `${label.slice(0, maxLen - 3)}...` : label;
}

function addressParts(address: NominatimAddress | undefined) {
  const addr = address ?? {};
  return {
    city: addr.city || addr.town || addr.village || addr.municipality || "",
    admin: addr.state || addr.county || addr.region || "",
    country: addr.country_code?.toUpperCase() || addr.country || "",
  };
}

export function createNominatimClient(opts: NominatimClientOptions) {
  const baseUrl = (opts.baseUrl ?? NOMINATIM_BASE_URL).replace(/\/+$/, "");
  const init: RequestInit = {
    headers: { "User-Agent": opts.userAgent, "Accept-Language": "en" },
  };

  /** Forward geocode; null when nothing matched. */
  const search = async (query: string): Promise<GeocodedPlace | null> => {
    const url = new URL(`${baseUrl}/search`);
    url.searchParams.set("q", query);
    url.searchParams.set("format", "json");
    url.searchParams.set("limit", "1");
    url.searchParams.set("addressdetails", "1");
    const body = await fetchJsonWithTimeout({
      url: url.toString(),
      init,
      timeoutMs: opts.timeoutMs,
      label: "Nominatim search",
      fetchFn: opts.fetchFn,
    });
    const results = z.array(z.unknown()).safeParse(body);
    const first = results.success ? SearchResultSchema.safeParse(results.data[0]) : undefined;
    if (!first?.success) {
      return null;
    }
    const place = first.data;
    const parts = addressParts(place.address);
    if (!parts.city && !parts.admin) {
      parts.city = place.display_name?.split(",")[0]?.trim() ?? "";
    }
    return { lat: place.lat, lon: place.lon, label: labelFromAddress(parts, query) };
  };

  /** Reverse geocode to a label; null when the service knows nothing there. */
  const reverse = async (lat: number, lon: number): Promise<string | null> => {
    const url = new URL(`${baseUrl}/reverse`);
    url.searchParams.set("lat", String(lat));
    url.searchParams.set("lon", String(lon));
    url.searchParams.set("format", "json");
    url.searchParams.set("zoom", "10");
    url.searchParams.set("addressdetails", "1");
    const body = await fetchJsonWithTimeout({
      url: url.toString(),
      init,
      timeoutMs: opts.timeoutMs,
      label: "Nominatim reverse",
      fetchFn: opts.fetchFn,
    });
    const parsed = ReverseResultSchema.safeParse(body);
    if (!parsed.success || parsed.data.error || !parsed.data.address) {
      return null;
    }
    return labelFromAddress(addressParts(parsed.data.address), formatCoordinates(lat, lon));
  };

  return { search, reverse };
}

export type NominatimClient = ReturnType<typeof createNominatimClient>;
