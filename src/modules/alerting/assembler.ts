import { ALERT_VALIDITY_DAYS, DataSources } from "./constants.js";
import type { AlertRecord, AssembleAlertInput } from "./types.js";

const MS_PER_DAY = 86_400_000;

function clamp(value: number, min: number, max: number): number {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** UTC "YYYYMMDD_HHMMSS". */
export function formatAlertTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

function idPart(value: string): string {
  return value.toUpperCase().slice(0, 3);
}

export function buildAlertId(state: string, district: string, village: string, now: Date): string {
  return [idPart(state), idPart(district), idPart(village), formatAlertTimestamp(now)].join("_");
}

export function estimateRainProbability(precipitationMm: number): number {
  if (precipitationMm <= 0) {
    return 10;
  }
  return clamp(Math.round(precipitationMm * 10), 10, 90);
}

export function estimateHumidity(precipitationMm: number): number {
  return clamp(60 + Math.round(precipitationMm * 2), 40, 95);
}

export function assembleAlert(input: AssembleAlertInput): AlertRecord {
  const now = input.now ?? new Date();
  const { location, crop, weather, classification, narrative } = input;
  const precipitation = weather.precipitationNext3DaysMm;

  return Object.freeze({
    alertId: buildAlertId(location.state, location.district, location.village, now),
    timestamp: now.toISOString(),
    location: Object.freeze({ ...location }),
    crop: Object.freeze({ ...crop }),
    alert: Object.freeze({
      type: classification.type,
      urgency: classification.urgency,
      message: narrative ? narrative.enhancedMessage : classification.message,
      actionItems: Object.freeze([...classification.actionItems]),
      validUntil: new Date(now.getTime() + ALERT_VALIDITY_DAYS * MS_PER_DAY).toISOString(),
      aiGenerated: narrative !== undefined
    }),
    weather: Object.freeze({
      forecastDays: input.forecastDays,
      rainProbability: estimateRainProbability(precipitation),
      expectedRainfallMm: roundTo(precipitation, 1),
      temperatureC: roundTo(weather.temperatureC, 1),
      humidityPercent: estimateHumidity(precipitation),
      windSpeedKmh: roundTo(weather.windSpeedKmh, 1)
    }),
    ...(narrative
      ? {
          aiAnalysis: Object.freeze({
            alert: narrative.alert,
            impact: narrative.impact,
            recommendations: narrative.recommendations
          })
        }
      : {}),
    dataSource: narrative ? DataSources.OPEN_METEO_WITH_AI : DataSources.OPEN_METEO
  });
}
