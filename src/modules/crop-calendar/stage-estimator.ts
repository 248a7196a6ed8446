import { InvalidCropDefinitionError, InvalidDateRangeError, ValidationError } from "../shared/errors.js";
import { createNoopLogger, type Logger } from "../shared/logger.js";
import { CROP_CALENDAR, getCropDefinition, type CropCalendar } from "./calendar.js";
import { UNKNOWN_STAGE } from "./constants.js";

const MS_PER_DAY = 86_400_000;

export interface StageEstimatorOptions {
  calendar?: CropCalendar;
  logger?: Logger;
}

function clampIndex(index: number, length: number): number {
  if (!Number.isFinite(index) || index < 0) return 0;
  return Math.min(Math.trunc(index), length - 1);
}

function assertMonth(month: number): void {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new RangeError(`month must be an integer between 1 and 12, got ${month}`);
  }
}

/**
 * Accepts a Date or an ISO calendar date ("2025-06-15") and returns the UTC
 * day number since the epoch.
 */
function toUtcDay(value: Date | string, fieldName: string): number {
  const date = typeof value === "string" ? new Date(value.trim()) : value;
  const time = date.getTime();
  if (!Number.isFinite(time)) {
    throw new ValidationError(`${fieldName} must be a valid date`);
  }
  return Math.floor(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()) / MS_PER_DAY
  );
}

function formatDay(day: number): string {
  return new Date(day * MS_PER_DAY).toISOString().slice(0, 10);
}

export function estimateStageByMonth(
  crop: string,
  month: number,
  options: StageEstimatorOptions = {}
): string {
  assertMonth(month);
  const calendar = options.calendar ?? CROP_CALENDAR;
  const definition = getCropDefinition(crop, calendar);
  if (!definition) {
    options.logger?.warn("crop not in calendar, using default stage", { crop });
    return UNKNOWN_STAGE;
  }

  const { stages } = definition;
  const mapped = calendar.monthStageIndex.get(definition.name)?.[month];
  const index = mapped ?? Math.floor(stages.length / 2);
  return stages[clampIndex(index, stages.length)] ?? UNKNOWN_STAGE;
}

export function estimateStageByPlanting(
  crop: string,
  plantDate: Date | string,
  currentDate: Date | string,
  options: StageEstimatorOptions = {}
): string {
  const calendar = options.calendar ?? CROP_CALENDAR;
  const logger = options.logger ?? createNoopLogger();

  const plantDay = toUtcDay(plantDate, "plantDate");
  const currentDay = toUtcDay(currentDate, "currentDate");
  if (plantDay > currentDay) {
    throw new InvalidDateRangeError(formatDay(plantDay), formatDay(currentDay));
  }

  const definition = getCropDefinition(crop, calendar);
  if (!definition) {
    logger.warn("crop not in calendar, using default stage", { crop });
    return UNKNOWN_STAGE;
  }

  const { stages, nominalDurationDays } = definition;
  const stageLength = Math.floor(nominalDurationDays / stages.length);
  if (stageLength === 0) {
    throw new InvalidCropDefinitionError(
      definition.name,
      `${stages.length} stages cannot fit in ${nominalDurationDays} days`
    );
  }

  const daysSincePlanting = currentDay - plantDay;
  const index = Math.min(Math.floor(daysSincePlanting / stageLength), stages.length - 1);
  return stages[clampIndex(index, stages.length)] ?? UNKNOWN_STAGE;
}
