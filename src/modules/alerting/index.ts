export * from "./constants.js";
export { assembleAlert, buildAlertId, estimateHumidity, estimateRainProbability, formatAlertTimestamp } from "./assembler.js";
export { classifyWeather, normalizeObservation } from "./rule-based-classifier.js";
export type { WeatherObservationInput } from "./rule-based-classifier.js";
export { parseAlertRecord } from "./schema.js";
export { AlertPipelineService } from "./service.js";
export type * from "./types.js";
