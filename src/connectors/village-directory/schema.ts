import type { Coordinates } from "../../modules/alerting/types.js";
import type { DistrictEntry, StateEntry, VillageEntry, VillageTable } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function parseCoordinates(value: unknown, label: string): Coordinates | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || value.length !== 2) {
    throw new Error(`${label}.coordinates must be a [latitude, longitude] pair`);
  }
  const [latitude, longitude]: unknown[] = value;
  if (
    typeof latitude !== "number" ||
    typeof longitude !== "number" ||
    Math.abs(latitude) > 90 ||
    Math.abs(longitude) > 180
  ) {
    throw new Error(`${label}.coordinates are out of range`);
  }
  return Object.freeze([latitude, longitude] as const);
}

function requireName(value: unknown, label: string): string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new Error(`${label}.name is required`);
  }
  return value.trim();
}

function parseVillage(raw: unknown, label: string): VillageEntry {
  if (!isRecord(raw)) {
    throw new Error(`${label} must be an object`);
  }
  return Object.freeze({
    name: requireName(raw.name, label),
    coordinates: parseCoordinates(raw.coordinates, label)
  });
}

function parseDistrict(key: string, raw: unknown, label: string): DistrictEntry {
  if (!isRecord(raw)) {
    throw new Error(`${label} must be an object`);
  }
  const villages = Array.isArray(raw.villages) ? raw.villages : [];
  return Object.freeze({
    key,
    name: requireName(raw.name, label),
    coordinates: parseCoordinates(raw.coordinates, label),
    villages: Object.freeze(
      villages.map((village, index) => parseVillage(village, `${label}.villages[${index}]`))
    )
  });
}

export function normalizeKey(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, " ");
}

export function parseVillageTable(payload: unknown): VillageTable {
  if (!isRecord(payload) || !isRecord(payload.states)) {
    throw new Error('Village table must contain a "states" object');
  }

  const states = new Map<string, StateEntry>();
  for (const [rawStateKey, rawState] of Object.entries(payload.states)) {
    const stateKey = normalizeKey(rawStateKey);
    if (!isRecord(rawState) || !isRecord(rawState.districts)) {
      throw new Error(`states.${rawStateKey} must contain "districts"`);
    }
    const districts = new Map<string, DistrictEntry>();
    for (const [rawDistrictKey, rawDistrict] of Object.entries(rawState.districts)) {
      const districtKey = normalizeKey(rawDistrictKey);
      districts.set(
        districtKey,
        parseDistrict(districtKey, rawDistrict, `states.${rawStateKey}.${rawDistrictKey}`)
      );
    }
    states.set(
      stateKey,
      Object.freeze({ key: stateKey, name: requireName(rawState.name, rawStateKey), districts })
    );
  }
  return states;
}
