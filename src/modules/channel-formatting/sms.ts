import type { AlertRecord } from "../alerting/types.js";
import { truncateCodePoints } from "./text.js";

export const SMS_MAX_LENGTH = 160;

// Longer phrases first so they win over the single words they contain.
const HINDI_GLOSSARY: ReadonlyArray<readonly [string, string]> = Object.freeze([
  ["heavy_rain_warning", "भारी वर्षा चेतावनी"],
  ["moderate_rain_warning", "मध्यम वर्षा चेतावनी"],
  ["heat_drought_warning", "गर्मी सूखा चेतावनी"],
  ["cold_warning", "ठंड चेतावनी"],
  ["high_wind_warning", "तेज़ हवा चेतावनी"],
  ["weather_update", "मौसम अपडेट"],
  ["Heavy rainfall", "भारी वर्षा"],
  ["Moderate rainfall", "मध्यम वर्षा"],
  ["High temperature", "उच्च तापमान"],
  ["Low temperature", "कम तापमान"],
  ["High winds", "तेज़ हवाएँ"],
  ["Alert", "चेतावनी"],
  ["Crop", "फसल"],
  ["Stage", "चरण"],
  ["Urgency", "तात्कालिकता"],
  ["Action", "कार्य"],
  ["rice", "चावल"],
  ["wheat", "गेहूं"],
  ["maize", "मक्का"],
  ["mustard", "सरसों"],
  ["gram", "चना"],
  ["potato", "आलू"],
  ["sugarcane", "गन्ना"],
  ["Flowering", "फूल"],
  ["high", "उच्च"],
  ["medium", "मध्यम"],
  ["low", "कम"],
  ["Kumhrar", "कुम्हरार"],
  ["Patna", "पटना"],
  ["Bihar", "बिहार"]
] as const);

const GLOSSARY_PATTERNS = HINDI_GLOSSARY.map(
  ([english, hindi]) => [new RegExp(`\\b${english}\\b`, "g"), hindi] as const
);

/** Whole-word glossary substitution; words outside the glossary stay in English. */
export function toHindi(text: string): string {
  return GLOSSARY_PATTERNS.reduce(
    (output, [pattern, hindi]) => output.replace(pattern, hindi),
    text
  );
}

export function formatSms(record: AlertRecord): string {
  const message =
    `${toHindi("Alert")}: ${toHindi(record.alert.type)}, ` +
    `${toHindi("Crop")}: ${toHindi(record.crop.name)}, ` +
    `${toHindi("Stage")}: ${toHindi(record.crop.stage)}, ` +
    `${toHindi("Urgency")}: ${toHindi(record.alert.urgency)}. ` +
    toHindi(record.alert.message);
  return truncateCodePoints(message, SMS_MAX_LENGTH);
}
