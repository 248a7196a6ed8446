import type { AlertRecord } from "../alerting/types.js";
import { truncateCodePoints } from "./text.js";

export const CSV_RESPONSE_MAX_LENGTH = 500;

const LINE_END = "\r\n";

function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function toCsvRow(fields: readonly string[]): string {
  return fields.map(escapeCsvField).join(",") + LINE_END;
}

function stringifyResponse(response: unknown): string {
  return typeof response === "string" ? response : JSON.stringify(response);
}

/**
 * Field/Value rows for the alert, a blank row, then one Agent/Response row per
 * channel output.
 */
export function exportAlertCsv(
  record: AlertRecord,
  responses: Readonly<Record<string, unknown>> = {}
): string {
  const [latitude, longitude] = record.location.coordinates;
  const rows: string[][] = [
    ["Field", "Value"],
    ["Alert ID", record.alertId],
    ["Village", record.location.village],
    ["District", record.location.district],
    ["State", record.location.state],
    ["Coordinates", `[${latitude}, ${longitude}]`],
    ["Crop", record.crop.name],
    ["Crop Stage", record.crop.stage],
    ["Temperature", `${record.weather.temperatureC}°C`],
    ["Rainfall", `${record.weather.expectedRainfallMm}mm`],
    ["Alert Type", record.alert.type],
    ["Urgency", record.alert.urgency],
    ["Alert Message", record.alert.message],
    [],
    ["Agent", "Response"]
  ];
  for (const [agent, response] of Object.entries(responses)) {
    rows.push([agent, truncateCodePoints(stringifyResponse(response), CSV_RESPONSE_MAX_LENGTH)]);
  }
  return rows.map(toCsvRow).join("");
}
