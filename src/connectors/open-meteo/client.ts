import { WeatherUnavailableError } from "../../modules/shared/errors.js";
import { errorMessage } from "../../modules/shared/logger.js";
import type { WeatherProvider } from "../../modules/alerting/types.js";
import { parseCurrentWeatherPayload, parseForecastPayload } from "./schema.js";
import type {
  OpenMeteoClientOptions,
  OpenMeteoCurrentWeather,
  OpenMeteoForecast
} from "./types.js";

const DAILY_FIELDS = [
  "weathercode",
  "temperature_2m_max",
  "temperature_2m_min",
  "precipitation_sum",
  "windspeed_10m_max"
].join(",");

function stripTrailingSlash(url: string): string {
  return url.endsWith("/") ? url.slice(0, -1) : url;
}

function assertPositiveInt(value: number, fieldName: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${fieldName} must be a positive integer`);
  }
}

function assertCoordinates(latitude: number, longitude: number): void {
  if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    throw new RangeError(`latitude must be between -90 and 90, got ${latitude}`);
  }
  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    throw new RangeError(`longitude must be between -180 and 180, got ${longitude}`);
  }
}

function parsePayload<T>(parse: (payload: unknown) => T, payload: unknown): T {
  try {
    return parse(payload);
  } catch (error) {
    throw new WeatherUnavailableError(
      `Open-Meteo returned an unexpected payload: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

export class OpenMeteoClient implements WeatherProvider {
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenMeteoClientOptions) {
    if (!options.baseUrl || options.baseUrl.trim() === "") {
      throw new Error("OpenMeteoClient requires a non-empty baseUrl");
    }
    assertPositiveInt(options.requestTimeoutMs, "requestTimeoutMs");

    this.baseUrl = stripTrailingSlash(options.baseUrl.trim());
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async getCurrentWeather(
    latitude: number,
    longitude: number,
    signal?: AbortSignal
  ): Promise<OpenMeteoCurrentWeather> {
    assertCoordinates(latitude, longitude);
    const url = this.forecastUrl(latitude, longitude);
    url.searchParams.set("current_weather", "true");
    return parsePayload(parseCurrentWeatherPayload, await this.getJson(url, signal));
  }

  async getForecast(
    latitude: number,
    longitude: number,
    days: number,
    signal?: AbortSignal
  ): Promise<OpenMeteoForecast> {
    assertCoordinates(latitude, longitude);
    assertPositiveInt(days, "days");
    const url = this.forecastUrl(latitude, longitude);
    url.searchParams.set("daily", DAILY_FIELDS);
    url.searchParams.set("timezone", "auto");
    url.searchParams.set("forecast_days", String(days));
    return parsePayload(parseForecastPayload, await this.getJson(url, signal));
  }

  private forecastUrl(latitude: number, longitude: number): URL {
    const url = new URL(`${this.baseUrl}/forecast`);
    url.searchParams.set("latitude", String(latitude));
    url.searchParams.set("longitude", String(longitude));
    return url;
  }

  private async getJson(url: URL, signal: AbortSignal | undefined): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.requestTimeoutMs);
    const requestSignal = signal ? AbortSignal.any([controller.signal, signal]) : controller.signal;

    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        headers: { accept: "application/json" },
        signal: requestSignal
      });

      if (!response.ok) {
        const body = await response.text();
        throw new WeatherUnavailableError(
          `Open-Meteo request failed (${response.status}): ${body}`
        );
      }

      const payload: unknown = await response.json();
      return payload;
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new WeatherUnavailableError(
          `Open-Meteo request timed out after ${this.requestTimeoutMs}ms`,
          { cause: error }
        );
      }
      if (error instanceof WeatherUnavailableError) {
        throw error;
      }
      throw new WeatherUnavailableError(`Open-Meteo request failed: ${errorMessage(error)}`, {
        cause: error
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
