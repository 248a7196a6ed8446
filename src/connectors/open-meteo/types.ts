import type { CurrentWeather, DailyForecast } from "../../modules/alerting/types.js";

export interface OpenMeteoCurrentWeather extends CurrentWeather {
  winddirection?: number | undefined;
  weathercode?: number | undefined;
  time?: string | undefined;
}

export interface OpenMeteoForecastDay {
  date: string;
  weatherCode: number | undefined;
  temperatureMaxC: number | undefined;
  temperatureMinC: number | undefined;
  precipitationSumMm: number;
  windSpeedMaxKmh: number | undefined;
}

export interface OpenMeteoForecast extends DailyForecast {
  days: OpenMeteoForecastDay[];
}

export interface OpenMeteoClientOptions {
  baseUrl: string;
  requestTimeoutMs: number;
  fetchImpl?: typeof fetch;
}
