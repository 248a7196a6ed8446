import assert from "node:assert/strict";
import test from "node:test";

import {
  assembleAlert,
  buildAlertId,
  estimateHumidity,
  estimateRainProbability
} from "../../src/modules/alerting/assembler.js";
import { classifyWeather } from "../../src/modules/alerting/rule-based-classifier.js";
import type { AssembleAlertInput } from "../../src/modules/alerting/types.js";

const now = new Date("2025-07-23T06:05:09Z");

function baseInput(): AssembleAlertInput {
  const weather = { temperatureC: 28.26, windSpeedKmh: 12, precipitationNext3DaysMm: 30.04 };
  return {
    location: {
      village: "Kumhrar",
      district: "Patna",
      state: "Bihar",
      coordinates: [25.596, 85.183],
      coordinatesSource: "village",
      totalVillagesInDistrict: 5
    },
    crop: { name: "rice", stage: "Flowering", season: "Kharif" },
    weather,
    forecastDays: 7,
    classification: classifyWeather({
      weather,
      crop: "rice",
      stage: "Flowering",
      village: "Kumhrar",
      district: "Patna"
    }),
    now
  };
}

test("alert ids use three-letter uppercase prefixes and a UTC stamp", () => {
  assert.equal(buildAlertId("Bihar", "Patna", "Kumhrar", now), "BIH_PAT_KUM_20250723_060509");
  assert.equal(
    buildAlertId("bihar", "West Champaran", "Phulwari Sharif", now),
    "BIH_WES_PHU_20250723_060509"
  );
  assert.equal(buildAlertId("Bihar", "Gaya", "Bo Gaya", now), "BIH_GAY_BO _20250723_060509");
});

test("rain probability is clamped to 10-90", () => {
  assert.equal(estimateRainProbability(-1), 10);
  assert.equal(estimateRainProbability(0), 10);
  assert.equal(estimateRainProbability(0.5), 10);
  assert.equal(estimateRainProbability(4.2), 42);
  assert.equal(estimateRainProbability(12), 90);
});

test("humidity is clamped to 40-95", () => {
  assert.equal(estimateHumidity(0), 60);
  assert.equal(estimateHumidity(5.3), 71);
  assert.equal(estimateHumidity(30), 95);
});

test("assembles a template alert without AI narrative", () => {
  const record = assembleAlert(baseInput());

  assert.equal(record.alertId, "BIH_PAT_KUM_20250723_060509");
  assert.equal(record.timestamp, "2025-07-23T06:05:09.000Z");
  assert.deepEqual(record.location.coordinates, [25.596, 85.183]);
  assert.deepEqual(record.crop, { name: "rice", stage: "Flowering", season: "Kharif" });
  assert.equal(record.alert.type, "heavy_rain_warning");
  assert.equal(record.alert.urgency, "high");
  assert.equal(
    record.alert.message,
    "Heavy rainfall (30.0mm) expected in next 3 days near Kumhrar, Patna. rice at Flowering stage may be affected. Delay fertilizer application and ensure proper drainage."
  );
  assert.equal(record.alert.validUntil, "2025-07-26T06:05:09.000Z");
  assert.equal(record.alert.aiGenerated, false);
  assert.deepEqual(record.weather, {
    forecastDays: 7,
    rainProbability: 90,
    expectedRainfallMm: 30,
    temperatureC: 28.3,
    humidityPercent: 95,
    windSpeedKmh: 12
  });
  assert.equal("aiAnalysis" in record, false);
  assert.equal(record.dataSource, "open_meteo");
});

test("AI narrative replaces the message and is recorded", () => {
  const record = assembleAlert({
    ...baseInput(),
    narrative: {
      alert: "Heavy showers likely",
      impact: "Waterlogging risk",
      recommendations: "Open field drains",
      enhancedMessage: "🤖 AI Weather Alert for Kumhrar, Patna: Heavy showers likely"
    }
  });

  assert.equal(record.alert.message, "🤖 AI Weather Alert for Kumhrar, Patna: Heavy showers likely");
  assert.equal(record.alert.aiGenerated, true);
  assert.deepEqual(record.aiAnalysis, {
    alert: "Heavy showers likely",
    impact: "Waterlogging risk",
    recommendations: "Open field drains"
  });
  assert.equal(record.dataSource, "open_meteo_with_ai_enhancement");
});

test("assembled records are frozen", () => {
  const record = assembleAlert(baseInput());

  assert.equal(Object.isFrozen(record), true);
  assert.equal(Object.isFrozen(record.alert), true);
  assert.equal(Object.isFrozen(record.alert.actionItems), true);
  assert.equal(Object.isFrozen(record.weather), true);
});
