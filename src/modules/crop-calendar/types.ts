import type { CropSeasonLabel, Season } from "./constants.js";

export interface CropDefinition {
  readonly name: string;
  readonly season: CropSeasonLabel;
  readonly sowingSeasons: readonly Season[];
  readonly plantingWindow: string;
  readonly harvestWindow: string;
  readonly nominalDurationDays: number;
  readonly stages: readonly string[];
}

export interface DistrictCropProfile {
  readonly primary: readonly string[];
  readonly secondary: readonly string[];
  readonly specialty: readonly string[];
}

/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

export type MonthStageIndex = Readonly<Record<number, number>>;
