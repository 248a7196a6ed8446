export interface AppConfig {
  defaultState: string;
  openMeteoBaseUrl: string;
  weatherRequestTimeoutMs: number;
  weatherForecastDays: number;
  openAiApiKey: string | undefined;
  openAiBaseUrl: string;
  openAiModel: string;
  narrativeTimeoutMs: number;
  advisoryGatewayHost: string;
  advisoryGatewayPort: number;
  advisoryGatewayMaxRequestBytes: number;
  advisoryGatewayAuthToken: string | undefined;
}

type EnvSource = NodeJS.ProcessEnv | Record<string, string | undefined>;

function parsePositiveInt(
  value: string | undefined,
  fallback: number,
  variableName: string
): number {
  if (value == null || value === "") {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${variableName} must be a positive integer`);
  }
  return parsed;
}

function parseBoundedInt(
  value: string | undefined,
  fallback: number,
  variableName: string,
  min: number,
  max: number
): number {
  const parsed = parsePositiveInt(value, fallback, variableName);
  if (parsed < min || parsed > max) {
    throw new Error(`${variableName} must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseOptionalString(value: string | undefined): string | undefined {
  if (value == null) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function parseUrl(value: string | undefined, fallback: string, variableName: string): string {
  const raw = parseOptionalString(value) ?? fallback;
  try {
    new URL(raw);
  } catch {
    throw new Error(`${variableName} must be an absolute URL`);
  }
  return raw;
}

export function loadConfig(env: EnvSource = process.env): AppConfig {
  return {
    defaultState: parseOptionalString(env.DEFAULT_STATE)?.toLowerCase() ?? "bihar",
    openMeteoBaseUrl: parseUrl(
      env.OPEN_METEO_BASE_URL,
      "https://api.open-meteo.com/v1",
      "OPEN_METEO_BASE_URL"
    ),
    weatherRequestTimeoutMs: parsePositiveInt(
      env.WEATHER_REQUEST_TIMEOUT_MS,
      8_000,
      "WEATHER_REQUEST_TIMEOUT_MS"
    ),
    // Open-Meteo serves at most 16 forecast days.
    weatherForecastDays: parseBoundedInt(
      env.WEATHER_FORECAST_DAYS,
      7,
      "WEATHER_FORECAST_DAYS",
      3,
      16
    ),
    openAiApiKey: parseOptionalString(env.OPENAI_API_KEY),
    openAiBaseUrl: parseUrl(env.OPENAI_BASE_URL, "https://api.openai.com/v1", "OPENAI_BASE_URL"),
    openAiModel: parseOptionalString(env.OPENAI_MODEL) ?? "gpt-4o-mini",
    narrativeTimeoutMs: parsePositiveInt(
      env.NARRATIVE_TIMEOUT_MS,
      8_000,
      "NARRATIVE_TIMEOUT_MS"
    ),
    advisoryGatewayHost: parseOptionalString(env.ADVISORY_GATEWAY_HOST) ?? "127.0.0.1",
    advisoryGatewayPort: parsePositiveInt(
      env.ADVISORY_GATEWAY_PORT,
      8000,
      "ADVISORY_GATEWAY_PORT"
    ),
    advisoryGatewayMaxRequestBytes: parsePositiveInt(
      env.ADVISORY_GATEWAY_MAX_REQUEST_BYTES,
      262_144,
      "ADVISORY_GATEWAY_MAX_REQUEST_BYTES"
    ),
    advisoryGatewayAuthToken: parseOptionalString(env.ADVISORY_GATEWAY_AUTH_TOKEN)
  };
}
