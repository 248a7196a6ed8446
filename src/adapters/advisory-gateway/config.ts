import { loadConfig, type AppConfig } from "../../config/env.js";

export interface AdvisoryGatewayConfig {
  host: string;
  port: number;
  maxRequestBytes: number;
  authToken: string | undefined;
  defaultState: string;
}

export function loadAdvisoryGatewayConfig(appConfig: AppConfig = loadConfig()): AdvisoryGatewayConfig {
  return {
    host: appConfig.advisoryGatewayHost,
    port: appConfig.advisoryGatewayPort,
    maxRequestBytes: appConfig.advisoryGatewayMaxRequestBytes,
    authToken: appConfig.advisoryGatewayAuthToken,
    defaultState: appConfig.defaultState
  };
}
