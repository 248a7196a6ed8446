/**
 * Named tools callable through the gateway's tool-dispatch routes. Each tool
 * validates its own parameters and delegates to the gateway service.
 */

import { ValidationError } from "../../modules/shared/errors.js";
import type { AdvisoryGatewayService } from "./service.js";

export type ToolParameters = Readonly<Record<string, unknown>>;

export type ToolHandler = (parameters: ToolParameters, signal?: AbortSignal) => Promise<unknown>;

export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly handler: ToolHandler;
}

export class ToolNotFoundError extends Error {
  constructor(readonly toolName: string) {
    super("Tool not found");
    this.name = "ToolNotFoundError";
  }
}

export interface ToolRegistry {
  getTool(name: string): ToolDefinition | undefined;
  listTools(): ToolDefinition[];
  /** Runs a tool by name; throws ToolNotFoundError when none is registered. */
  callTool(name: string, parameters: ToolParameters, signal?: AbortSignal): Promise<unknown>;
}

// Open-Meteo serves at most 16 forecast days.
const MAX_FORECAST_DAYS = 16;

function requireString(parameters: ToolParameters, key: string): string {
  const value = parameters[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError(`"${key}" must be a non-empty string`);
  }
  return value.trim();
}

function optionalString(parameters: ToolParameters, key: string): string | undefined {
  const value = parameters[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  return requireString(parameters, key);
}

function requireCoordinate(parameters: ToolParameters, key: string, limit: number): number {
  const value = parameters[key];
  if (typeof value !== "number" || !Number.isFinite(value) || Math.abs(value) > limit) {
    throw new ValidationError(`"${key}" must be a number between -${limit} and ${limit}`);
  }
  return value;
}

function optionalDays(parameters: ToolParameters): number | undefined {
  const value = parameters.days;
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1 || value > MAX_FORECAST_DAYS) {
    throw new ValidationError(`"days" must be an integer between 1 and ${MAX_FORECAST_DAYS}`);
  }
  return value;
}

function coordinates(parameters: ToolParameters): [latitude: number, longitude: number] {
  return [requireCoordinate(parameters, "latitude", 90), requireCoordinate(parameters, "longitude", 180)];
}

function defineTools(service: AdvisoryGatewayService, defaultState: string): ToolDefinition[] {
  return [
    {
      name: "get_current_weather",
      description: "Current temperature and wind speed at a coordinate",
      handler: (parameters, signal) => service.getCurrentWeather(...coordinates(parameters), signal)
    },
    {
      name: "get_weather_forecast",
      description: "Daily forecast at a coordinate",
      handler: (parameters, signal) =>
        service.getForecast(...coordinates(parameters), optionalDays(parameters), signal)
    },
    {
      name: "list_villages",
      description: "Districts of a state, or villages of one district",
      handler: async (parameters) => {
        const state = requireString(parameters, "state");
        const district = optionalString(parameters, "district");
        if (district === undefined) {
          return { state, districts: await service.listDistricts(state) };
        }
        return { state, district, villages: await service.listVillages(state, district) };
      }
    },
    {
      name: "reverse_geocode",
      description: "Coordinates of a village or district by name",
      handler: async (parameters) => {
        const location = requireString(parameters, "location");
        const [latitude, longitude] = await service.reverseGeocode(location);
        return { location, latitude, longitude };
      }
    },
    {
      name: "get_crop_calendar",
      description: "Calendar entry for one crop, or every crop and district of a region",
      handler: (parameters) =>
        service.getCropCalendar(requireString(parameters, "region"), optionalString(parameters, "crop_type"))
    },
    {
      name: "get_prominent_crops",
      description: "Crops sown in a season",
      handler: async (parameters) => {
        const region = requireString(parameters, "region");
        const season = requireString(parameters, "season");
        // Resolves the region so an unknown one is reported as such.
        await service.getCropCalendar(region);
        return { crops: service.listSeasonalCrops(season) };
      }
    },
    {
      name: "estimate_crop_stage",
      description: "Growth stage from planting and current dates",
      handler: async (parameters) => {
        const crop = requireString(parameters, "crop");
        const plantDate = requireString(parameters, "plant_date");
        const currentDate = optionalString(parameters, "current_date");
        return { stage: service.estimateStage(crop, plantDate, currentDate) };
      }
    },
    {
      name: "run_workflow",
      description: "Generate an alert for a district with every channel format and a CSV",
      handler: (parameters, signal) =>
        service.runWorkflow(
          optionalString(parameters, "state") ?? defaultState,
          requireString(parameters, "district"),
          signal
        )
    }
  ];
}

export function createToolRegistry(
  service: AdvisoryGatewayService,
  defaultState: string
): ToolRegistry {
  const tools = new Map<string, ToolDefinition>();
  for (const tool of defineTools(service, defaultState)) {
    tools.set(tool.name, Object.freeze(tool));
  }

  return {
    getTool(name) {
      return tools.get(name);
    },
    listTools() {
      return Array.from(tools.values());
    },
    async callTool(name, parameters, signal) {
      const tool = tools.get(name);
      if (!tool) {
        throw new ToolNotFoundError(name);
      }
      return tool.handler(parameters, signal);
    }
  };
}
