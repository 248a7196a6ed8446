import assert from "node:assert/strict";
import test from "node:test";

import { StaticVillageDirectory } from "../../src/connectors/village-directory/directory.js";
import { AlertPipelineService } from "../../src/modules/alerting/service.js";
import type {
  AlertPipelineServiceOptions,
  CurrentWeather,
  DailyForecast,
  NarrativeGenerator,
  NarrativeRequest,
  WeatherProvider
} from "../../src/modules/alerting/types.js";
import { LocationNotFoundError, WeatherUnavailableError } from "../../src/modules/shared/errors.js";
import type { Logger } from "../../src/modules/shared/logger.js";

interface LogEntry {
  level: "info" | "warn" | "error";
  message: string;
}

function createCapturingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    logger: {
      info(message) {
        entries.push({ level: "info", message });
      },
      warn(message) {
        entries.push({ level: "warn", message });
      },
      error(message) {
        entries.push({ level: "error", message });
      }
    }
  };
}

function createWeatherProvider(
  current: CurrentWeather = { temperature: 28, windspeed: 12 },
  forecast: DailyForecast = { precipitationSumPerDay: [12, 10, 8, 50, 0, 0, 0] }
): WeatherProvider & { calls: number } {
  return {
    calls: 0,
    async getCurrentWeather() {
      this.calls += 1;
      return current;
    },
    async getForecast() {
      this.calls += 1;
      return forecast;
    }
  };
}

function createService(overrides: Partial<AlertPipelineServiceOptions> = {}): AlertPipelineService {
  return new AlertPipelineService({
    locationDirectory: new StaticVillageDirectory(),
    weatherProvider: createWeatherProvider(),
    random: () => 0,
    clock: () => new Date("2025-07-23T06:05:09Z"),
    ...overrides
  });
}

test("generates a heavy rain alert for Patna", async () => {
  const service = createService();

  const record = await service.generateAlert({ state: "bihar", district: "patna" });

  assert.equal(record.alertId, "BIH_PAT_KUM_20250723_060509");
  assert.deepEqual(record.location, {
    village: "Kumhrar",
    district: "Patna",
    state: "Bihar",
    coordinates: [25.596, 85.183],
    coordinatesSource: "village",
    totalVillagesInDistrict: 5
  });
  assert.deepEqual(record.crop, { name: "rice", stage: "Transplanting", season: "Kharif" });
  assert.equal(record.alert.type, "heavy_rain_warning");
  assert.equal(
    record.alert.message,
    "Heavy rainfall (30.0mm) expected in next 3 days near Kumhrar, Patna. rice at Transplanting stage may be affected. Delay fertilizer application and ensure proper drainage."
  );
  assert.equal(record.weather.forecastDays, 7);
  assert.equal(record.weather.temperatureC, 28);
  assert.equal(record.alert.aiGenerated, false);
  assert.equal(Object.isFrozen(record), true);
});

test("falls back to district coordinates when the village has none", async () => {
  const record = await createService().generateAlert({ state: "Bihar", district: "Sheohar" });

  assert.equal(record.location.village, "Piprahi");
  assert.deepEqual(record.location.coordinates, [26.51, 85.29]);
  assert.equal(record.location.coordinatesSource, "district");
});

test("districts without villages fail before any weather call", async () => {
  const weatherProvider = createWeatherProvider();
  const service = createService({ weatherProvider });

  await assert.rejects(
    service.generateAlert({ state: "bihar", district: "arwal" }),
    (error: unknown) =>
      error instanceof LocationNotFoundError && error.message === "No villages found for Arwal, Bihar"
  );
  await assert.rejects(
    service.generateAlert({ state: "bihar", district: "atlantis" }),
    LocationNotFoundError
  );
  assert.equal(weatherProvider.calls, 0);
});

test("weather failures surface as WeatherUnavailable", async () => {
  const service = createService({
    weatherProvider: {
      async getCurrentWeather() {
        return { temperature: 30, windspeed: 5 };
      },
      async getForecast() {
        throw new Error("upstream 503");
      }
    }
  });

  await assert.rejects(
    service.generateAlert({ state: "bihar", district: "patna" }),
    (error: unknown) =>
      error instanceof WeatherUnavailableError &&
      error.message === "Weather data unavailable for Kumhrar, Patna: upstream 503"
  );
});

test("AI narrative replaces the template message", async () => {
  const requests: NarrativeRequest[] = [];
  const narrativeGenerator: NarrativeGenerator = {
    enabled: true,
    async generate(request) {
      requests.push(request);
      return {
        alert: "Rain through Friday",
        impact: "Waterlogging",
        recommendations: "Clear drains",
        enhancedMessage: "🤖 AI Weather Alert for Kumhrar, Patna: Rain through Friday"
      };
    }
  };

  const record = await createService({ narrativeGenerator }).generateAlert({
    state: "bihar",
    district: "patna"
  });

  assert.equal(record.alert.aiGenerated, true);
  assert.equal(record.alert.message, "🤖 AI Weather Alert for Kumhrar, Patna: Rain through Friday");
  assert.equal(record.dataSource, "open_meteo_with_ai_enhancement");
  assert.deepEqual(requests[0]?.weather, {
    temperatureC: 28,
    windSpeedKmh: 12,
    precipitationForecastMm: [12, 10, 8]
  });
});

test("AI narrative failures degrade to the template message", async () => {
  const { logger, entries } = createCapturingLogger();
  const record = await createService({
    logger,
    narrativeGenerator: {
      enabled: true,
      async generate() {
        throw new Error("quota exceeded");
      }
    }
  }).generateAlert({ state: "bihar", district: "patna" });

  assert.equal(record.alert.aiGenerated, false);
  assert.equal(record.dataSource, "open_meteo");
  assert.ok(
    entries.some(
      (entry) =>
        entry.level === "warn" && entry.message === "AI narrative unavailable, using template message"
    )
  );
});

test("disabled narrative generators are never called", async () => {
  let called = false;
  const record = await createService({
    narrativeGenerator: {
      enabled: false,
      async generate() {
        called = true;
        throw new Error("should not run");
      }
    }
  }).generateAlert({ state: "bihar", district: "patna" });

  assert.equal(called, false);
  assert.equal(record.alert.aiGenerated, false);
});

test("the season follows the date in India, not UTC", async () => {
  // 20:00 UTC on 31 May is already 1 June in India.
  const record = await createService({
    clock: () => new Date("2025-05-31T20:00:00Z")
  }).generateAlert({ state: "bihar", district: "patna" });

  assert.deepEqual(record.crop, { name: "rice", stage: "Nursery/Seedling", season: "Kharif" });
  assert.equal(record.alertId, "BIH_PAT_KUM_20250531_200000");
});

test("an already aborted request does no work", async () => {
  const weatherProvider = createWeatherProvider();
  const controller = new AbortController();
  controller.abort();

  await assert.rejects(
    createService({ weatherProvider }).generateAlert({
      state: "bihar",
      district: "patna",
      signal: controller.signal
    }),
    { name: "AbortError" }
  );
  assert.equal(weatherProvider.calls, 0);
});

test("aborting mid-flight cancels the weather calls", async () => {
  const controller = new AbortController();
  const service = createService({
    weatherProvider: {
      getCurrentWeather(_latitude, _longitude, signal) {
        return new Promise<CurrentWeather>((_resolve, reject) => {
          if (signal?.aborted) {
            reject(new Error("request aborted"));
            return;
          }
          signal?.addEventListener("abort", () => reject(new Error("request aborted")));
        });
      },
      async getForecast() {
        return { precipitationSumPerDay: [0, 0, 0] };
      }
    }
  });

  const pending = service.generateAlert({
    state: "bihar",
    district: "patna",
    signal: controller.signal
  });
  controller.abort();

  await assert.rejects(pending, (error: unknown) => {
    return !(error instanceof WeatherUnavailableError) && error instanceof Error && error.message === "request aborted";
  });
});

test("blank state or district is a validation error", async () => {
  await assert.rejects(createService().generateAlert({ state: "bihar", district: "  " }), {
    name: "ValidationError"
  });
});
