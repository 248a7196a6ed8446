export const AlertTypes = Object.freeze({
  HEAVY_RAIN_WARNING: "heavy_rain_warning",
  MODERATE_RAIN_WARNING: "moderate_rain_warning",
  HEAT_DROUGHT_WARNING: "heat_drought_warning",
  COLD_WARNING: "cold_warning",
  HIGH_WIND_WARNING: "high_wind_warning",
  WEATHER_UPDATE: "weather_update"
});

export type AlertType = (typeof AlertTypes)[keyof typeof AlertTypes];

export const VALID_ALERT_TYPES: ReadonlySet<string> = new Set<string>(Object.values(AlertTypes));

export const Urgencies = Object.freeze({
  LOW: "low",
  MEDIUM: "medium",
  HIGH: "high"
});

export type Urgency = (typeof Urgencies)[keyof typeof Urgencies];

export const ActionItems = Object.freeze({
  DELAY_FERTILIZER: "delay_fertilizer",
  CHECK_DRAINAGE: "check_drainage",
  MONITOR_CROPS: "monitor_crops",
  PREPARE_HARVEST_PROTECTION: "prepare_harvest_protection",
  MONITOR_SOIL: "monitor_soil",
  ADJUST_IRRIGATION: "adjust_irrigation",
  INCREASE_IRRIGATION: "increase_irrigation",
  MULCH_CROPS: "mulch_crops",
  MONITOR_PLANT_STRESS: "monitor_plant_stress",
  PROTECT_CROPS: "protect_crops",
  COVER_SEEDLINGS: "cover_seedlings",
  ADJUST_IRRIGATION_TIMING: "adjust_irrigation_timing",
  SECURE_SUPPORTS: "secure_supports",
  CHECK_STRUCTURES: "check_structures",
  MONITOR_DAMAGE: "monitor_damage",
  ROUTINE_MONITORING: "routine_monitoring",
  MAINTAIN_IRRIGATION: "maintain_irrigation"
});

export type ActionItem = (typeof ActionItems)[keyof typeof ActionItems];

export const AlertThresholds = Object.freeze({
  HEAVY_RAIN_MM: 25,
  MODERATE_RAIN_MM: 10,
  DRY_SPELL_MM: 2,
  HEAT_C: 35,
  COLD_C: 10,
  HIGH_WIND_KMH: 30
});

export const WeatherDefaults = Object.freeze({
  TEMPERATURE_C: 25,
  WIND_SPEED_KMH: 10,
  PRECIPITATION_MM: 0
});

export const ALERT_VALIDITY_DAYS = 3;
export const PRECIPITATION_WINDOW_DAYS = 3;

export const DataSources = Object.freeze({
  OPEN_METEO: "open_meteo",
  OPEN_METEO_WITH_AI: "open_meteo_with_ai_enhancement"
});

export type DataSource = (typeof DataSources)[keyof typeof DataSources];
