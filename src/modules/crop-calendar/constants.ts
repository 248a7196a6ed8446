export const Seasons = Object.freeze({
  KHARIF: "Kharif",
  RABI: "Rabi",
  ZAID: "Zaid"
});

export type Season = (typeof Seasons)[keyof typeof Seasons];

export const VALID_SEASONS: ReadonlySet<string> = new Set<string>(Object.values(Seasons));

export type CropSeasonLabel = Season | "Annual" | "mixed";

export const CropTiers = Object.freeze({
  PRIMARY: "primary",
  SECONDARY: "secondary",
  SPECIALTY: "specialty"
});

export type CropTier = (typeof CropTiers)[keyof typeof CropTiers];

export const TIER_WEIGHTS: Readonly<Record<CropTier, number>> = Object.freeze({
  primary: 5,
  secondary: 3,
  specialty: 1
});

// Stage reported for crops missing from the calendar.
export const UNKNOWN_STAGE = "Growing";

export const DEFAULT_CROP = "rice";
