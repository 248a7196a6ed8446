import { Seasons, type Season } from "./constants.js";

/**
 * Maps a calendar month (1-12) to its agricultural season.
 * Kharif: June-September, Rabi: October-March, Zaid: April-May.
 */
export function classifySeason(month: number): Season {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new RangeError(`month must be an integer between 1 and 12, got ${month}`);
  }
  if (month >= 6 && month <= 9) {
    return Seasons.KHARIF;
  }
  if (month === 4 || month === 5) {
    return Seasons.ZAID;
  }
  return Seasons.RABI;
}

// India Standard Time, UTC+05:30; no daylight saving.
const IST_OFFSET_MS = 330 * 60 * 1000;

/** Calendar month (1-12) of the given instant as observed in India. */
export function monthInIndia(date: Date): number {
  return new Date(date.getTime() + IST_OFFSET_MS).getUTCMonth() + 1;
}

export function parseSeason(value: string): Season | undefined {
  const normalized = value.trim().toLowerCase();
  return Object.values(Seasons).find((season) => season.toLowerCase() === normalized);
}
