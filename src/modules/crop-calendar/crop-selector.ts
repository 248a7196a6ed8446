import { DEFAULT_CROP, TIER_WEIGHTS, type Season } from "./constants.js";
import { DISTRICT_CROP_TABLE, type DistrictCropTable } from "./calendar.js";
import { pickOne } from "./random.js";
import type { DistrictCropProfile, RandomSource } from "./types.js";

export interface WeightedCrop {
  crop: string;
  weight: number;
}

export function getDistrictProfile(
  district: string,
  table: DistrictCropTable = DISTRICT_CROP_TABLE
): DistrictCropProfile {
  return table.districts.get(district.trim().toLowerCase()) ?? table.defaultProfile;
}

function tierWeight(crop: string, profile: DistrictCropProfile): number {
  if (profile.primary.includes(crop)) {
    return TIER_WEIGHTS.primary;
  }
  if (profile.secondary.includes(crop)) {
    return TIER_WEIGHTS.secondary;
  }
  if (profile.specialty.includes(crop)) {
    return TIER_WEIGHTS.specialty;
  }
  return 1;
}

/**
 * District crops sown in the season, each with its tier weight. When nothing
 * in the profile fits the season the district's primary crops (or rice) are
 * used instead.
 */
export function buildWeightedCandidates(
  district: string,
  season: Season,
  table: DistrictCropTable = DISTRICT_CROP_TABLE
): WeightedCrop[] {
  const profile = getDistrictProfile(district, table);
  const compatible = table.seasonalCrops.get(season) ?? new Set<string>();

  const districtCrops = [...profile.primary, ...profile.secondary, ...profile.specialty];
  let candidates = [...new Set(districtCrops)].filter((crop) => compatible.has(crop));

  if (candidates.length === 0) {
    candidates = profile.primary.length > 0 ? [...new Set(profile.primary)] : [DEFAULT_CROP];
  }

  return candidates.map((crop) => ({ crop, weight: tierWeight(crop, profile) }));
}

export function selectCrop(
  district: string,
  season: Season,
  random: RandomSource = Math.random,
  table: DistrictCropTable = DISTRICT_CROP_TABLE
): string {
  const weighted = buildWeightedCandidates(district, season, table).flatMap(({ crop, weight }) =>
    Array.from({ length: weight }, () => crop)
  );
  return pickOne(weighted, random) ?? DEFAULT_CROP;
}
