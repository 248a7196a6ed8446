import { loadConfig } from "../../config/env.js";
import { OpenMeteoClient } from "../../connectors/open-meteo/client.js";
import { StaticVillageDirectory } from "../../connectors/village-directory/directory.js";
import { AlertPipelineService } from "../../modules/alerting/service.js";
import { createConsoleLogger } from "../../modules/shared/logger.js";
import { OpenAiNarrativeGenerator } from "../narrative-llm/service.js";
import { loadAdvisoryGatewayConfig } from "./config.js";
import { createAdvisoryGatewayServer } from "./server.js";
import { AdvisoryGatewayService } from "./service.js";

async function main(): Promise<void> {
  const appConfig = loadConfig();
  const gatewayConfig = loadAdvisoryGatewayConfig(appConfig);
  const logger = createConsoleLogger("advisory-gateway");

  const directory = new StaticVillageDirectory();
  const weather = new OpenMeteoClient({
    baseUrl: appConfig.openMeteoBaseUrl,
    requestTimeoutMs: appConfig.weatherRequestTimeoutMs
  });
  const narrativeGenerator = new OpenAiNarrativeGenerator({
    apiKey: appConfig.openAiApiKey,
    baseUrl: appConfig.openAiBaseUrl,
    model: appConfig.openAiModel,
    requestTimeoutMs: appConfig.narrativeTimeoutMs
  });
  if (!narrativeGenerator.enabled) {
    logger.warn("OPENAI_API_KEY not set, alerts use template messages only");
  }

  const pipeline = new AlertPipelineService({
    locationDirectory: directory,
    weatherProvider: weather,
    narrativeGenerator,
    forecastDays: appConfig.weatherForecastDays,
    logger: createConsoleLogger("alert-pipeline")
  });
  const service = new AdvisoryGatewayService({
    pipeline,
    directory,
    weather,
    forecastDays: appConfig.weatherForecastDays,
    logger
  });
  const server = createAdvisoryGatewayServer(gatewayConfig, service, logger);

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    logger.info("shutting down", { signal });
    await server.stop();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  await server.start();
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
