export { OpenMeteoClient } from "./client.js";
export { parseCurrentWeatherPayload, parseForecastPayload } from "./schema.js";
export type {
  OpenMeteoClientOptions,
  OpenMeteoCurrentWeather,
  OpenMeteoForecast,
  OpenMeteoForecastDay
} from "./types.js";
