import cropCalendarData from "../../../data/crop-calendar.json" with { type: "json" };
import districtCropsData from "../../../data/district-crops.json" with { type: "json" };
import { InvalidCropDefinitionError } from "../shared/errors.js";
import { VALID_SEASONS, type CropSeasonLabel, type Season } from "./constants.js";
import type { CropDefinition, DistrictCropProfile, MonthStageIndex } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isSeason(value: unknown): value is Season {
  return typeof value === "string" && VALID_SEASONS.has(value);
}

function isSeasonLabel(value: unknown): value is CropSeasonLabel {
  return isSeason(value) || value === "Annual" || value === "mixed";
}

function asStringList(value: unknown, fieldName: string): string[] {
  if (!Array.isArray(value)) {
    throw new Error(`${fieldName} must be an array`);
  }
  return value.map((item, index) => {
    if (typeof item !== "string" || item.trim() === "") {
      throw new Error(`${fieldName}[${index}] must be a non-empty string`);
    }
    return item.trim();
  });
}

function asCropNameList(value: unknown, fieldName: string): string[] {
  return asStringList(value, fieldName).map((crop) => crop.toLowerCase());
}

function parseCropDefinition(raw: unknown, index: number): CropDefinition {
  if (!isRecord(raw)) {
    throw new Error(`crops[${index}] must be an object`);
  }

  const name = typeof raw.name === "string" ? raw.name.trim().toLowerCase() : "";
  if (!name) {
    throw new Error(`crops[${index}].name is required`);
  }
  const season = raw.season;
  if (!isSeasonLabel(season)) {
    throw new InvalidCropDefinitionError(name, `unknown season "${String(season)}"`);
  }

  const sowingSeasons = asStringList(raw.sowingSeasons ?? [], `${name}.sowingSeasons`).map(
    (season) => {
      if (!isSeason(season)) {
        throw new InvalidCropDefinitionError(name, `unknown sowing season "${season}"`);
      }
      return season;
    }
  );

  const stages = asStringList(raw.stages, `${name}.stages`);
  if (stages.length === 0) {
    throw new InvalidCropDefinitionError(name, "stages must not be empty");
  }

  const duration = raw.nominalDurationDays;
  if (typeof duration !== "number" || !Number.isInteger(duration) || duration <= 0) {
    throw new InvalidCropDefinitionError(name, "nominalDurationDays must be a positive integer");
  }
  // Planting-date estimation divides the duration evenly across stages.
  if (stages.length > duration) {
    throw new InvalidCropDefinitionError(
      name,
      `${stages.length} stages cannot fit in ${duration} days`
    );
  }

  return Object.freeze({
    name,
    season,
    sowingSeasons: Object.freeze(sowingSeasons),
    plantingWindow: typeof raw.plantingWindow === "string" ? raw.plantingWindow : "",
    harvestWindow: typeof raw.harvestWindow === "string" ? raw.harvestWindow : "",
    nominalDurationDays: duration,
    stages: Object.freeze(stages)
  });
}

function parseMonthStageIndex(raw: unknown, cropName: string): MonthStageIndex {
  if (!isRecord(raw)) {
    throw new Error(`monthStageIndex.${cropName} must be an object`);
  }
  const table: Record<number, number> = {};
  for (const [monthKey, value] of Object.entries(raw)) {
    const month = Number.parseInt(monthKey, 10);
    if (!Number.isInteger(month) || month < 1 || month > 12) {
      throw new Error(`monthStageIndex.${cropName} has invalid month "${monthKey}"`);
    }
    if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
      throw new Error(`monthStageIndex.${cropName}.${monthKey} must be a non-negative integer`);
    }
    table[month] = value;
  }
  return Object.freeze(table);
}

export interface CropCalendar {
  readonly crops: ReadonlyMap<string, CropDefinition>;
  readonly monthStageIndex: ReadonlyMap<string, MonthStageIndex>;
}

export function parseCropCalendar(payload: unknown): CropCalendar {
  if (!isRecord(payload) || !Array.isArray(payload.crops)) {
    throw new Error('Crop calendar must contain a "crops" array');
  }

  const crops = new Map<string, CropDefinition>();
  payload.crops.forEach((raw, index) => {
    const definition = parseCropDefinition(raw, index);
    crops.set(definition.name, definition);
  });

  const monthStageIndex = new Map<string, MonthStageIndex>();
  if (isRecord(payload.monthStageIndex)) {
    for (const [cropName, rawTable] of Object.entries(payload.monthStageIndex)) {
      monthStageIndex.set(cropName.toLowerCase(), parseMonthStageIndex(rawTable, cropName));
    }
  }

  return Object.freeze({ crops, monthStageIndex });
}

function parseDistrictProfile(raw: unknown, district: string): DistrictCropProfile {
  if (!isRecord(raw)) {
    throw new Error(`District profile "${district}" must be an object`);
  }
  return Object.freeze({
    primary: Object.freeze(asCropNameList(raw.primary ?? [], `${district}.primary`)),
    secondary: Object.freeze(asCropNameList(raw.secondary ?? [], `${district}.secondary`)),
    specialty: Object.freeze(asCropNameList(raw.specialty ?? [], `${district}.specialty`))
  });
}

export interface DistrictCropTable {
  readonly defaultProfile: DistrictCropProfile;
  readonly districts: ReadonlyMap<string, DistrictCropProfile>;
  readonly seasonalCrops: ReadonlyMap<Season, ReadonlySet<string>>;
}

export function parseDistrictCropTable(payload: unknown): DistrictCropTable {
  if (!isRecord(payload)) {
    throw new Error("District crop table must be an object");
  }

  const districts = new Map<string, DistrictCropProfile>();
  if (isRecord(payload.districts)) {
    for (const [district, raw] of Object.entries(payload.districts)) {
      districts.set(district.trim().toLowerCase(), parseDistrictProfile(raw, district));
    }
  }

  const seasonalCrops = new Map<Season, ReadonlySet<string>>();
  if (!isRecord(payload.seasonalCrops)) {
    throw new Error('District crop table must contain "seasonalCrops"');
  }
  for (const [season, raw] of Object.entries(payload.seasonalCrops)) {
    if (!isSeason(season)) {
      throw new Error(`seasonalCrops has unknown season "${season}"`);
    }
    seasonalCrops.set(season, new Set(asCropNameList(raw, `seasonalCrops.${season}`)));
  }

  return Object.freeze({
    defaultProfile: parseDistrictProfile(payload.defaultProfile, "defaultProfile"),
    districts,
    seasonalCrops
  });
}

export const CROP_CALENDAR: CropCalendar = parseCropCalendar(cropCalendarData);
export const DISTRICT_CROP_TABLE: DistrictCropTable = parseDistrictCropTable(districtCropsData);

export function getCropDefinition(
  crop: string,
  calendar: CropCalendar = CROP_CALENDAR
): CropDefinition | undefined {
  return calendar.crops.get(crop.trim().toLowerCase());
}

export function listCrops(calendar: CropCalendar = CROP_CALENDAR): CropDefinition[] {
  return Array.from(calendar.crops.values());
}

/**
 * Calendar crops sown in the given season. Annual crops belong to no season.
 */
export function listSeasonalCrops(
  season: Season,
  calendar: CropCalendar = CROP_CALENDAR
): string[] {
  return listCrops(calendar)
    .filter((crop) => crop.sowingSeasons.includes(season))
    .map((crop) => crop.name);
}
