import type { OpenMeteoCurrentWeather, OpenMeteoForecast } from "../../connectors/open-meteo/types.js";
import type { StaticVillageDirectory } from "../../connectors/village-directory/directory.js";
import { parseAlertRecord } from "../../modules/alerting/schema.js";
import type { AlertPipelineService } from "../../modules/alerting/service.js";
import type { AlertRecord, Coordinates } from "../../modules/alerting/types.js";
import { getCropDefinition, listCrops, listSeasonalCrops } from "../../modules/crop-calendar/calendar.js";
import { parseSeason } from "../../modules/crop-calendar/season.js";
import { estimateStageByPlanting } from "../../modules/crop-calendar/stage-estimator.js";
import type { CropDefinition } from "../../modules/crop-calendar/types.js";
import {
  exportAlertCsv,
  formatAllChannels,
  formatChannel,
  type Channel,
  type ChannelOutputs
} from "../../modules/channel-formatting/index.js";
import { ValidationError } from "../../modules/shared/errors.js";
import type { Logger } from "../../modules/shared/logger.js";

export interface WorkflowResult {
  status: "success";
  alert: AlertRecord;
  channels: ChannelOutputs;
  csv: string;
}

export interface WeatherSnapshot {
  current: OpenMeteoCurrentWeather;
  forecast: OpenMeteoForecast;
}

export type CropCalendarView =
  | { region: string; crop: CropDefinition }
  | { region: string; crops: string[]; districts: string[] };

export interface WeatherLookup {
  getCurrentWeather(
    latitude: number,
    longitude: number,
    signal?: AbortSignal
  ): Promise<OpenMeteoCurrentWeather>;
  getForecast(
    latitude: number,
    longitude: number,
    days: number,
    signal?: AbortSignal
  ): Promise<OpenMeteoForecast>;
}

export interface AdvisoryGatewayServiceOptions {
  pipeline: AlertPipelineService;
  directory: StaticVillageDirectory;
  weather: WeatherLookup;
  forecastDays: number;
  logger?: Logger;
}

export class AdvisoryGatewayService {
  constructor(private readonly options: AdvisoryGatewayServiceOptions) {}

  get aiEnhancementAvailable(): boolean {
    return this.options.pipeline.narrativeEnabled;
  }

  async runWorkflow(state: string, district: string, signal?: AbortSignal): Promise<WorkflowResult> {
    const alert = await this.options.pipeline.generateAlert({
      state,
      district,
      ...(signal ? { signal } : {})
    });
    const channels = formatAllChannels(alert);
    const csv = exportAlertCsv(alert, {
      SMS: channels.sms,
      WhatsApp: channels.whatsapp,
      USSD: channels.ussd,
      IVR: channels.ivr,
      Telegram: channels.telegram
    });
    return { status: "success", alert, channels, csv };
  }

  formatChannel(channel: Channel, payload: unknown): ChannelOutputs[Channel] {
    return formatChannel(channel, parseAlertRecord(payload));
  }

  listDistricts(state: string): Promise<string[]> {
    return this.options.directory.listDistricts(state);
  }

  listVillages(state: string, district: string): Promise<string[]> {
    return this.options.directory.listVillages(state, district);
  }

  reverseGeocode(location: string): Promise<Coordinates> {
    return this.options.directory.reverseGeocode(location);
  }

  /** One crop's calendar entry, or every crop and district of the region. */
  async getCropCalendar(region: string, cropType?: string): Promise<CropCalendarView> {
    const state = await this.options.directory.resolveStateName(region);
    if (cropType === undefined) {
      return {
        region: state,
        crops: listCrops().map((crop) => crop.name),
        districts: await this.options.directory.listDistricts(state)
      };
    }
    const crop = getCropDefinition(cropType);
    if (!crop) {
      throw new ValidationError(`Unknown crop "${cropType}" in ${state}`);
    }
    return { region: state, crop };
  }

  listCrops(): CropDefinition[] {
    return listCrops();
  }

  listSeasonalCrops(season: string): string[] {
    const parsed = parseSeason(season);
    if (!parsed) {
      throw new ValidationError(`Unknown season "${season}"; expected Kharif, Rabi or Zaid`);
    }
    return listSeasonalCrops(parsed);
  }

  estimateStage(crop: string, plantDate: string, currentDate: string | undefined): string {
    return estimateStageByPlanting(crop, plantDate, currentDate ?? new Date(), {
      ...(this.options.logger ? { logger: this.options.logger } : {})
    });
  }

  getCurrentWeather(latitude: number, longitude: number, signal?: AbortSignal): Promise<OpenMeteoCurrentWeather> {
    return this.options.weather.getCurrentWeather(latitude, longitude, signal);
  }

  getForecast(
    latitude: number,
    longitude: number,
    days: number = this.options.forecastDays,
    signal?: AbortSignal
  ): Promise<OpenMeteoForecast> {
    return this.options.weather.getForecast(latitude, longitude, days, signal);
  }

  async getWeather(latitude: number, longitude: number, signal?: AbortSignal): Promise<WeatherSnapshot> {
    const [current, forecast] = await Promise.all([
      this.options.weather.getCurrentWeather(latitude, longitude, signal),
      this.options.weather.getForecast(latitude, longitude, this.options.forecastDays, signal)
    ]);
    return { current, forecast };
  }
}
