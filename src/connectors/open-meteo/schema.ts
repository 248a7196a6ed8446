import type { OpenMeteoCurrentWeather, OpenMeteoForecast, OpenMeteoForecastDay } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() !== "" ? value : undefined;
}

function arrayField(record: Record<string, unknown>, key: string): unknown[] {
  const value = record[key];
  return Array.isArray(value) ? value : [];
}

export function parseCurrentWeatherPayload(payload: unknown): OpenMeteoCurrentWeather {
  if (!isRecord(payload) || !isRecord(payload.current_weather)) {
    throw new Error('Open-Meteo response is missing "current_weather"');
  }
  const current = payload.current_weather;
  return {
    temperature: optionalNumber(current.temperature),
    windspeed: optionalNumber(current.windspeed),
    winddirection: optionalNumber(current.winddirection),
    weathercode: optionalNumber(current.weathercode),
    time: optionalString(current.time)
  };
}

/**
 * Missing or null daily precipitation counts as 0mm so the sum over any
 * window stays finite.
 */
export function parseForecastPayload(payload: unknown): OpenMeteoForecast {
  if (!isRecord(payload) || !isRecord(payload.daily)) {
    throw new Error('Open-Meteo response is missing "daily"');
  }
  const daily = payload.daily;
  const dates = arrayField(daily, "time");
  const codes = arrayField(daily, "weathercode");
  const maxima = arrayField(daily, "temperature_2m_max");
  const minima = arrayField(daily, "temperature_2m_min");
  const precipitation = arrayField(daily, "precipitation_sum");
  const wind = arrayField(daily, "windspeed_10m_max");

  const length = Math.max(dates.length, precipitation.length);
  const days: OpenMeteoForecastDay[] = [];
  for (let index = 0; index < length; index += 1) {
    days.push({
      date: optionalString(dates[index]) ?? "",
      weatherCode: optionalNumber(codes[index]),
      temperatureMaxC: optionalNumber(maxima[index]),
      temperatureMinC: optionalNumber(minima[index]),
      precipitationSumMm: optionalNumber(precipitation[index]) ?? 0,
      windSpeedMaxKmh: optionalNumber(wind[index])
    });
  }

  return {
    days,
    precipitationSumPerDay: days.map((day) => day.precipitationSumMm)
  };
}
