import {
  ActionItems,
  AlertThresholds,
  AlertTypes,
  Urgencies,
  WeatherDefaults
} from "./constants.js";
import type {
  AlertClassification,
  AlertClassificationInput,
  WeatherObservation
} from "./types.js";

export interface WeatherObservationInput {
  temperatureC?: number | undefined;
  windSpeedKmh?: number | undefined;
  precipitationNext3DaysMm?: number | undefined;
}

function finiteOr(value: number | undefined, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

export function normalizeObservation(input: WeatherObservationInput): WeatherObservation {
  return {
    temperatureC: finiteOr(input.temperatureC, WeatherDefaults.TEMPERATURE_C),
    windSpeedKmh: finiteOr(input.windSpeedKmh, WeatherDefaults.WIND_SPEED_KMH),
    precipitationNext3DaysMm: finiteOr(
      input.precipitationNext3DaysMm,
      WeatherDefaults.PRECIPITATION_MM
    )
  };
}

function oneDecimal(value: number): string {
  return value.toFixed(1);
}

/**
 * First matching rule wins: heavy rain, moderate rain, heat with dry spell,
 * cold, high wind, then a routine update.
 */
export function classifyWeather(input: AlertClassificationInput): AlertClassification {
  const { crop, stage, village, district } = input;
  const { temperatureC, windSpeedKmh, precipitationNext3DaysMm } = normalizeObservation(
    input.weather
  );
  const rain = oneDecimal(precipitationNext3DaysMm);
  const temperature = oneDecimal(temperatureC);
  const near = `near ${village}, ${district}`;

  if (precipitationNext3DaysMm > AlertThresholds.HEAVY_RAIN_MM) {
    return {
      type: AlertTypes.HEAVY_RAIN_WARNING,
      urgency: Urgencies.HIGH,
      message:
        `Heavy rainfall (${rain}mm) expected in next 3 days ${near}. ` +
        `${crop} at ${stage} stage may be affected. ` +
        "Delay fertilizer application and ensure proper drainage.",
      actionItems: [
        ActionItems.DELAY_FERTILIZER,
        ActionItems.CHECK_DRAINAGE,
        ActionItems.MONITOR_CROPS,
        ActionItems.PREPARE_HARVEST_PROTECTION
      ]
    };
  }

  if (precipitationNext3DaysMm > AlertThresholds.MODERATE_RAIN_MM) {
    return {
      type: AlertTypes.MODERATE_RAIN_WARNING,
      urgency: Urgencies.MEDIUM,
      message:
        `Moderate rainfall (${rain}mm) expected in next 3 days ${near}. ` +
        `Monitor ${crop} at ${stage} stage carefully.`,
      actionItems: [
        ActionItems.MONITOR_SOIL,
        ActionItems.CHECK_DRAINAGE,
        ActionItems.ADJUST_IRRIGATION
      ]
    };
  }

  if (
    precipitationNext3DaysMm < AlertThresholds.DRY_SPELL_MM &&
    temperatureC > AlertThresholds.HEAT_C
  ) {
    return {
      type: AlertTypes.HEAT_DROUGHT_WARNING,
      urgency: Urgencies.HIGH,
      message:
        `High temperature (${temperature}°C) with minimal rainfall expected ${near}. ` +
        `${crop} at ${stage} stage needs extra care. Increase irrigation frequency.`,
      actionItems: [
        ActionItems.INCREASE_IRRIGATION,
        ActionItems.MULCH_CROPS,
        ActionItems.MONITOR_PLANT_STRESS
      ]
    };
  }

  if (temperatureC < AlertThresholds.COLD_C) {
    return {
      type: AlertTypes.COLD_WARNING,
      urgency: Urgencies.MEDIUM,
      message: `Low temperature (${temperature}°C) expected ${near}. Protect ${crop} crops from cold damage.`,
      actionItems: [
        ActionItems.PROTECT_CROPS,
        ActionItems.COVER_SEEDLINGS,
        ActionItems.ADJUST_IRRIGATION_TIMING
      ]
    };
  }

  if (windSpeedKmh > AlertThresholds.HIGH_WIND_KMH) {
    return {
      type: AlertTypes.HIGH_WIND_WARNING,
      urgency: Urgencies.MEDIUM,
      message:
        `High winds (${oneDecimal(windSpeedKmh)} km/h) expected ${near}. ` +
        `Secure ${crop} crop supports and structures.`,
      actionItems: [
        ActionItems.SECURE_SUPPORTS,
        ActionItems.CHECK_STRUCTURES,
        ActionItems.MONITOR_DAMAGE
      ]
    };
  }

  return {
    type: AlertTypes.WEATHER_UPDATE,
    urgency: Urgencies.LOW,
    message:
      `Normal weather conditions expected ${near}. ${crop} at ${stage} stage. ` +
      `Temperature ${temperature}°C, rainfall ${rain}mm.`,
    actionItems: [ActionItems.ROUTINE_MONITORING, ActionItems.MAINTAIN_IRRIGATION]
  };
}
