import { VALID_SEASONS, type Season } from "../crop-calendar/constants.js";
import { ValidationError } from "../shared/errors.js";
import {
  AlertTypes,
  DataSources,
  Urgencies,
  VALID_ALERT_TYPES,
  type AlertType,
  type DataSource,
  type Urgency
} from "./constants.js";
import type { AiAnalysis, AlertRecord, Coordinates } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function objectField(parent: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = parent[key];
  if (!isRecord(value)) {
    throw new ValidationError(`alert.${key} must be an object`);
  }
  return value;
}

function stringField(parent: Record<string, unknown>, key: string, path: string): string {
  const value = parent[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError(`${path}.${key} must be a non-empty string`);
  }
  return value;
}

function numberField(parent: Record<string, unknown>, key: string, path: string): number {
  const value = parent[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ValidationError(`${path}.${key} must be a finite number`);
  }
  return value;
}

function isAlertType(value: string): value is AlertType {
  return VALID_ALERT_TYPES.has(value);
}

function isUrgency(value: string): value is Urgency {
  return value === Urgencies.LOW || value === Urgencies.MEDIUM || value === Urgencies.HIGH;
}

function isSeason(value: string): value is Season {
  return VALID_SEASONS.has(value);
}

function parseCoordinates(value: unknown): Coordinates {
  if (!Array.isArray(value) || value.length !== 2) {
    throw new ValidationError("location.coordinates must be a [latitude, longitude] pair");
  }
  const [latitude, longitude]: unknown[] = value;
  if (typeof latitude !== "number" || typeof longitude !== "number") {
    throw new ValidationError("location.coordinates must be a [latitude, longitude] pair");
  }
  return [latitude, longitude];
}

function parseActionItems(value: unknown): string[] {
  const items: unknown[] = Array.isArray(value) ? value : [];
  const strings = items.filter((item): item is string => typeof item === "string");
  if (!Array.isArray(value) || strings.length !== items.length) {
    throw new ValidationError("alert.alert.actionItems must be an array of strings");
  }
  return strings;
}

function parseAiAnalysis(value: unknown): AiAnalysis | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ValidationError("alert.aiAnalysis must be an object");
  }
  return {
    alert: stringField(value, "alert", "aiAnalysis"),
    impact: stringField(value, "impact", "aiAnalysis"),
    recommendations: stringField(value, "recommendations", "aiAnalysis")
  };
}

/**
 * Validates an alert record received over the wire, e.g. one posted back for
 * re-formatting on a single channel.
 */
export function parseAlertRecord(payload: unknown): AlertRecord {
  if (!isRecord(payload)) {
    throw new ValidationError("alert must be an object");
  }

  const location = objectField(payload, "location");
  const crop = objectField(payload, "crop");
  const alert = objectField(payload, "alert");
  const weather = objectField(payload, "weather");

  const type = stringField(alert, "type", "alert.alert");
  if (!isAlertType(type)) {
    throw new ValidationError(`alert.alert.type "${type}" is not a known alert type`);
  }
  const urgency = stringField(alert, "urgency", "alert.alert");
  if (!isUrgency(urgency)) {
    throw new ValidationError(`alert.alert.urgency "${urgency}" must be low, medium or high`);
  }
  const season = stringField(crop, "season", "alert.crop");
  if (!isSeason(season)) {
    throw new ValidationError(`alert.crop.season "${season}" is not a known season`);
  }
  const actionItems = parseActionItems(alert.actionItems);
  if (actionItems.length === 0 && type !== AlertTypes.WEATHER_UPDATE) {
    throw new ValidationError(`alert.alert.actionItems must not be empty for a ${type} alert`);
  }

  const aiAnalysis = parseAiAnalysis(payload.aiAnalysis);
  const dataSource: DataSource =
    payload.dataSource === DataSources.OPEN_METEO_WITH_AI
      ? DataSources.OPEN_METEO_WITH_AI
      : DataSources.OPEN_METEO;

  return {
    alertId: stringField(payload, "alertId", "alert"),
    timestamp: stringField(payload, "timestamp", "alert"),
    location: {
      village: stringField(location, "village", "alert.location"),
      district: stringField(location, "district", "alert.location"),
      state: stringField(location, "state", "alert.location"),
      coordinates: parseCoordinates(location.coordinates),
      coordinatesSource:
        typeof location.coordinatesSource === "string" ? location.coordinatesSource : "unknown",
      totalVillagesInDistrict:
        typeof location.totalVillagesInDistrict === "number" ? location.totalVillagesInDistrict : 0
    },
    crop: {
      name: stringField(crop, "name", "alert.crop"),
      stage: stringField(crop, "stage", "alert.crop"),
      season
    },
    alert: {
      type,
      urgency,
      message: stringField(alert, "message", "alert.alert"),
      actionItems,
      validUntil: stringField(alert, "validUntil", "alert.alert"),
      aiGenerated: alert.aiGenerated === true
    },
    weather: {
      forecastDays: numberField(weather, "forecastDays", "alert.weather"),
      rainProbability: numberField(weather, "rainProbability", "alert.weather"),
      expectedRainfallMm: numberField(weather, "expectedRainfallMm", "alert.weather"),
      temperatureC: numberField(weather, "temperatureC", "alert.weather"),
      humidityPercent: numberField(weather, "humidityPercent", "alert.weather"),
      windSpeedKmh: numberField(weather, "windSpeedKmh", "alert.weather")
    },
    ...(aiAnalysis ? { aiAnalysis } : {}),
    dataSource
  };
}
