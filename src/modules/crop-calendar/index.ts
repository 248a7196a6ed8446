export {
  CROP_CALENDAR,
  DISTRICT_CROP_TABLE,
  getCropDefinition,
  listCrops,
  listSeasonalCrops,
  parseCropCalendar,
  parseDistrictCropTable
} from "./calendar.js";
export type { CropCalendar, DistrictCropTable } from "./calendar.js";
export { Seasons, TIER_WEIGHTS, UNKNOWN_STAGE } from "./constants.js";
export type { CropSeasonLabel, Season } from "./constants.js";
export { buildWeightedCandidates, getDistrictProfile, selectCrop } from "./crop-selector.js";
export { createSeededRandom, pickOne } from "./random.js";
export { classifySeason, monthInIndia, parseSeason } from "./season.js";
export { estimateStageByMonth, estimateStageByPlanting } from "./stage-estimator.js";
export type { CropDefinition, DistrictCropProfile, RandomSource } from "./types.js";
