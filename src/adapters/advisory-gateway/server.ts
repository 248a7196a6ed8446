import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";

import { VALID_CHANNELS, type Channel } from "../../modules/channel-formatting/types.js";
import {
  InvalidDateRangeError,
  LocationNotFoundError,
  ValidationError,
  WeatherUnavailableError
} from "../../modules/shared/errors.js";
import { createNoopLogger, errorMessage, type Logger } from "../../modules/shared/logger.js";
import type { AdvisoryGatewayConfig } from "./config.js";
import type { AdvisoryGatewayService } from "./service.js";
import { createToolRegistry, ToolNotFoundError, type ToolParameters } from "./tools.js";

interface JsonResponse {
  statusCode: number;
  body: unknown;
}

class RequestBodyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RequestBodyError";
  }
}

function respondJson(res: ServerResponse, response: JsonResponse): void {
  res.statusCode = response.statusCode;
  res.setHeader("content-type", "application/json; charset=utf-8");
  res.end(JSON.stringify(response.body));
}

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isAuthorized(req: IncomingMessage, authToken: string | undefined): boolean {
  if (!authToken) {
    return true;
  }
  return req.headers.authorization === `Bearer ${authToken}`;
}

function isChannel(value: string): value is Channel {
  return VALID_CHANNELS.has(value);
}

async function readJsonBody(req: IncomingMessage, maxRequestBytes: number): Promise<unknown> {
  const chunks: Buffer[] = [];
  let total = 0;

  for await (const chunk of req) {
    const bufferChunk = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    total += bufferChunk.length;
    if (total > maxRequestBytes) {
      throw new RequestBodyError(`Request body exceeds max size (${maxRequestBytes} bytes)`);
    }
    chunks.push(bufferChunk);
  }

  const text = Buffer.concat(chunks).toString("utf8");
  if (text.trim() === "") {
    throw new RequestBodyError("Request body must not be empty");
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new RequestBodyError(`Request body is not valid JSON: ${errorMessage(error)}`);
  }
}

function requireString(payload: Record<string, unknown>, key: string): string {
  const value = payload[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError(`"${key}" must be a non-empty string`);
  }
  return value.trim();
}

function parseCoordinate(raw: string, name: string, limit: number): number {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value) || Math.abs(value) > limit) {
    throw new ValidationError(`${name} must be a number between -${limit} and ${limit}`);
  }
  return value;
}

function optionalObject(payload: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = payload[key];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isObjectRecord(value)) {
    throw new ValidationError(`"${key}" must be an object`);
  }
  return value;
}

// JSON-RPC 2.0 error codes.
export const RpcErrorCodes = Object.freeze({
  METHOD_NOT_FOUND: -32601,
  TOOL_FAILED: -32000
});

type RpcId = string | number | null;

function rpcId(payload: Record<string, unknown>): RpcId {
  const id = payload.id;
  return typeof id === "string" || typeof id === "number" ? id : null;
}

function rpcError(id: RpcId, code: number, message: string): JsonResponse {
  return { statusCode: 200, body: { jsonrpc: "2.0", error: { code, message }, id } };
}

function decodeSegments(pathname: string): string[] {
  try {
    return pathname
      .split("/")
      .filter((segment) => segment !== "")
      .map((segment) => decodeURIComponent(segment));
  } catch {
    throw new ValidationError("Request path is not valid percent-encoding");
  }
}

/** Maps domain errors to HTTP status codes and a stable error code. */
export function errorResponse(error: unknown): JsonResponse {
  const message = errorMessage(error);
  if (error instanceof RequestBodyError) {
    return { statusCode: 400, body: { status: "error", error: "INVALID_REQUEST_BODY", message } };
  }
  if (
    error instanceof ValidationError ||
    error instanceof InvalidDateRangeError ||
    error instanceof RangeError
  ) {
    return { statusCode: 400, body: { status: "error", error: "VALIDATION_FAILED", message } };
  }
  if (error instanceof ToolNotFoundError) {
    return { statusCode: 404, body: { status: "error", error: "TOOL_NOT_FOUND", message } };
  }
  if (error instanceof LocationNotFoundError) {
    return { statusCode: 404, body: { status: "error", error: "LOCATION_NOT_FOUND", message } };
  }
  if (error instanceof WeatherUnavailableError) {
    return { statusCode: 502, body: { status: "error", error: "WEATHER_UNAVAILABLE", message } };
  }
  return { statusCode: 500, body: { status: "error", error: "INTERNAL_ERROR", message } };
}

export interface AdvisoryGatewayServer {
  start(): Promise<void>;
  stop(): Promise<void>;
  /** Bound port once started; useful when listening on port 0. */
  port(): number | undefined;
}

export function createAdvisoryGatewayServer(
  config: AdvisoryGatewayConfig,
  service: AdvisoryGatewayService,
  logger: Logger = createNoopLogger()
): AdvisoryGatewayServer {
  const tools = createToolRegistry(service, config.defaultState);

  async function readObjectBody(req: IncomingMessage): Promise<Record<string, unknown>> {
    const payload = await readJsonBody(req, config.maxRequestBytes);
    if (!isObjectRecord(payload)) {
      throw new ValidationError("Request body must be an object");
    }
    return payload;
  }

  async function callToolRoute(req: IncomingMessage, signal: AbortSignal): Promise<JsonResponse> {
    const payload = await readObjectBody(req);
    const tool = requireString(payload, "tool");
    const parameters: ToolParameters = optionalObject(payload, "parameters");
    return { statusCode: 200, body: { tool, result: await tools.callTool(tool, parameters, signal) } };
  }

  async function rpcRoute(req: IncomingMessage, signal: AbortSignal): Promise<JsonResponse> {
    const payload = await readObjectBody(req);
    const id = rpcId(payload);
    if (payload.method !== "call_tool") {
      return rpcError(id, RpcErrorCodes.METHOD_NOT_FOUND, "Unknown method");
    }

    try {
      const params = optionalObject(payload, "params");
      const toolName = requireString(params, "tool_name");
      const result = await tools.callTool(toolName, optionalObject(params, "arguments"), signal);
      return { statusCode: 200, body: { jsonrpc: "2.0", result, id } };
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      logger.warn("tool call failed", { id, error: errorMessage(error) });
      return rpcError(id, RpcErrorCodes.TOOL_FAILED, errorMessage(error));
    }
  }

  async function route(req: IncomingMessage, signal: AbortSignal): Promise<JsonResponse> {
    const method = req.method ?? "GET";
    const url = new URL(req.url ?? "/", "http://localhost");
    const segments = decodeSegments(url.pathname);
    const [first, second, third, fourth] = segments;

    if (method === "GET" && url.pathname === "/health") {
      return {
        statusCode: 200,
        body: {
          status: "ok",
          service: "advisory-gateway",
          aiEnhancement: service.aiEnhancementAvailable
        }
      };
    }

    if (method === "POST" && url.pathname === "/mcp") {
      return callToolRoute(req, signal);
    }

    if (method === "POST" && url.pathname === "/mcp-rpc") {
      return rpcRoute(req, signal);
    }

    if (method === "GET" && url.pathname === "/mcp/tools") {
      return {
        statusCode: 200,
        body: { tools: tools.listTools().map(({ name, description }) => ({ name, description })) }
      };
    }

    if (first !== "v1") {
      return notFound();
    }

    if (method === "POST" && second === "workflow" && segments.length === 2) {
      const payload = await readObjectBody(req);
      const state =
        typeof payload.state === "string" && payload.state.trim() !== ""
          ? payload.state.trim()
          : config.defaultState;
      const district = requireString(payload, "district");
      return { statusCode: 200, body: await service.runWorkflow(state, district, signal) };
    }

    if (method === "POST" && second === "channels" && third && segments.length === 3) {
      if (!isChannel(third)) {
        throw new ValidationError(
          `Unknown channel "${third}"; expected one of ${[...VALID_CHANNELS].join(", ")}`
        );
      }
      const payload = await readObjectBody(req);
      return {
        statusCode: 200,
        body: { channel: third, output: service.formatChannel(third, payload.alert) }
      };
    }

    if (method !== "GET") {
      return notFound();
    }

    if (second === "districts" && third && segments.length === 3) {
      return { statusCode: 200, body: { state: third, districts: await service.listDistricts(third) } };
    }

    if (second === "villages" && third && fourth && segments.length === 4) {
      return {
        statusCode: 200,
        body: { state: third, district: fourth, villages: await service.listVillages(third, fourth) }
      };
    }

    if (second === "crops" && segments.length === 2) {
      return { statusCode: 200, body: { crops: service.listCrops() } };
    }

    if (second === "crops" && third === "season" && fourth && segments.length === 4) {
      return {
        statusCode: 200,
        body: { season: fourth, crops: service.listSeasonalCrops(fourth) }
      };
    }

    if (second === "crops" && third && fourth === "stage" && segments.length === 4) {
      const plantDate = url.searchParams.get("plantDate");
      if (!plantDate) {
        throw new ValidationError('"plantDate" query parameter is required');
      }
      const currentDate = url.searchParams.get("currentDate") ?? undefined;
      return {
        statusCode: 200,
        body: { crop: third, stage: service.estimateStage(third, plantDate, currentDate) }
      };
    }

    if (second === "weather" && third && fourth && segments.length === 4) {
      const latitude = parseCoordinate(third, "latitude", 90);
      const longitude = parseCoordinate(fourth, "longitude", 180);
      return { statusCode: 200, body: await service.getWeather(latitude, longitude, signal) };
    }

    return notFound();
  }

  function notFound(): JsonResponse {
    return {
      statusCode: 404,
      body: { status: "error", error: "NOT_FOUND", message: "Route not found" }
    };
  }

  const server = createServer(async (req, res) => {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    if (!isAuthorized(req, config.authToken)) {
      respondJson(res, {
        statusCode: 401,
        body: { status: "error", error: "UNAUTHORIZED", message: "Valid bearer token is required" }
      });
      return;
    }

    try {
      respondJson(res, await route(req, controller.signal));
    } catch (error) {
      if (controller.signal.aborted) {
        logger.warn("request abandoned by client", { url: req.url });
        return;
      }
      const response = errorResponse(error);
      if (response.statusCode >= 500) {
        logger.error("request failed", { url: req.url, error: errorMessage(error) });
      }
      respondJson(res, response);
    }
  });

  function boundPort(): number | undefined {
    const address: AddressInfo | string | null = server.address();
    return address && typeof address === "object" ? address.port : undefined;
  }

  return {
    async start(): Promise<void> {
      await new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(config.port, config.host, () => {
          server.off("error", reject);
          logger.info("listening", { url: `http://${config.host}:${boundPort() ?? config.port}` });
          resolve();
        });
      });
    },
    async stop(): Promise<void> {
      if (!server.listening) {
        return;
      }

      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });
    },
    port: boundPort
  };
}
