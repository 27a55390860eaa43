import { z } from "zod";
import { fetchJsonWithTimeout } from "../utils/fetch-timeout.js";

export const OPEN_METEO_URL = "https://api.open-meteo.com/v1/forecast";

const HOURLY_WINDOW_MS = 6 * 3_600_000 + 60_000;
const DAILY_DAYS = 3;
const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

export type Forecast = {
  hourly: string[];
  daily: string[];
};

const series = z.array(z.number().nullable());

const ForecastResponseSchema = z.object({
  utc_offset_seconds: z.number().default(0),
  hourly: z.object({
    time: z.array(z.string()),
    temperature_2m: series,
    precipitation_probability: series,
  }),
  daily: z.object({
    time: z.array(z.string()),
    temperature_2m_max: series,
    temperature_2m_min: series,
    precipitation_probability_max: series,
  }),
});

export type ForecastResponse = z.infer<typeof ForecastResponseSchema>;

const pad2 = (value: number) => String(value).padStart(2, "0");

function fmtNumber(value: number | null | undefined): string {
  return typeof value === "number" ? String(Math.round(value)) : "?";
}

// Open-Meteo returns location-local wall time without an offset ("2025-03-04T10:00").
// Treating it as UTC keeps all arithmetic in one frame.
function parseLocalTime(value: string): number {
  return Date.parse(value.length === 10 ? `${value}T00:00Z` : `${value}Z`);
}

/**
 * Turns a forecast response into display lines: hours after `nowMs` within
 * the next six hours, then the three days after today.
 */
export function formatForecast(data: ForecastResponse, nowMs: number): Forecast {
  const localNow = nowMs + data.utc_offset_seconds * 1000;
  const hourly: string[] = [];
  data.hourly.time.forEach((time, index) => {
    const at = parseLocalTime(time);
    if (!Number.isFinite(at) || at <= localNow || at > localNow + HOURLY_WINDOW_MS) {
      return;
    }
    const hour = pad2(new Date(at).getUTCHours());
    const temp = fmtNumber(data.hourly.temperature_2m[index]);
    const precip = fmtNumber(data.hourly.precipitation_probability[index]);
    hourly.push(`${hour}:00 ${temp}C, ${precip}%`);
  });

  const daily: string[] = [];
  for (let index = 1; index <= DAILY_DAYS && index < data.daily.time.length; index += 1) {
    const at = parseLocalTime(data.daily.time[index] ?? "");
    if (!Number.isFinite(at)) {
      continue;
    }
    const date = new Date(at);
    const day = `${WEEKDAYS[date.getUTCDay()]} ${pad2(date.getUTCDate())} ${MONTHS[date.getUTCMonth()]}`;
    const min = fmtNumber(data.daily.temperature_2m_min[index]);
    const max = fmtNumber(data.daily.temperature_2m_max[index]);
    const precip = fmtNumber(data.daily.precipitation_probability_max[index]);
    daily.push(`${day}: ${min}-${max}C, ${precip}%`);
  }

  return {
    hourly: hourly.length > 0 ? hourly : ["(no hourly data)"],
    daily: daily.length > 0 ? daily : ["(no daily data)"],
  };
}

export async function fetchOpenMeteoForecast(params: {
  lat: number;
  lon: number;
  timeoutMs: number;
  now?: () => number;
  baseUrl?: string;
  fetchFn?: typeof fetch;
}): Promise<Forecast> {
  const url = new URL(params.baseUrl ?? OPEN_METEO_URL);
  url.searchParams.set("latitude", String(params.lat));
  url.searchParams.set("longitude", String(params.lon));
  url.searchParams.set("hourly", "temperature_2m,precipitation_probability");
  url.searchParams.set(
    "daily",
    "temperature_2m_max,temperature_2m_min,precipitation_probability_max",
  );
  url.searchParams.set("forecast_days", String(DAILY_DAYS + 1));
  url.searchParams.set("timezone", "auto");
  const body = await fetchJsonWithTimeout({
    url: url.toString(),
    timeoutMs: params.timeoutMs,
    label: "Open-Meteo",
    fetchFn: params.fetchFn,
  });
  const parsed = ForecastResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new Error("Open-Meteo returned an unexpected forecast shape");
  }
  return formatForecast(parsed.data, (params.now ?? Date.now)());
}
