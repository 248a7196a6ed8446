import { selectCrop } from "../crop-calendar/crop-selector.js";
import { pickOne } from "../crop-calendar/random.js";
import { classifySeason, monthInIndia } from "../crop-calendar/season.js";
import { estimateStageByMonth } from "../crop-calendar/stage-estimator.js";
import type { RandomSource } from "../crop-calendar/types.js";
import {
  LocationNotFoundError,
  ValidationError,
  WeatherUnavailableError
} from "../shared/errors.js";
import { createNoopLogger, errorMessage, type Logger } from "../shared/logger.js";
import { assembleAlert } from "./assembler.js";
import { PRECIPITATION_WINDOW_DAYS } from "./constants.js";
import { classifyWeather, normalizeObservation } from "./rule-based-classifier.js";
import type {
  AlertPipelineServiceOptions,
  AlertRecord,
  Coordinates,
  GenerateAlertRequest,
  LocationDirectory,
  NarrativeGenerator,
  NarrativeRequest,
  NarrativeResult,
  WeatherObservation,
  WeatherProvider
} from "./types.js";

interface ResolvedCoordinates {
  coordinates: Coordinates;
  source: string;
}

interface FetchedWeather {
  observation: WeatherObservation;
  precipitationForecastMm: number[];
}

function sumFirstDays(values: readonly number[], days: number): number {
  return values
    .slice(0, days)
    .reduce((total, value) => total + (Number.isFinite(value) ? value : 0), 0);
}

export class AlertPipelineService {
  private readonly locationDirectory: LocationDirectory;
  private readonly weatherProvider: WeatherProvider;
  private readonly narrativeGenerator: NarrativeGenerator | undefined;
  private readonly forecastDays: number;
  private readonly random: RandomSource;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: AlertPipelineServiceOptions) {
    this.locationDirectory = options.locationDirectory;
    this.weatherProvider = options.weatherProvider;
    this.narrativeGenerator = options.narrativeGenerator;
    this.forecastDays = options.forecastDays ?? 7;
    this.random = options.random ?? Math.random;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createNoopLogger();
  }

  get narrativeEnabled(): boolean {
    return this.narrativeGenerator?.enabled ?? false;
  }

  async generateAlert(request: GenerateAlertRequest): Promise<AlertRecord> {
    const { signal } = request;
    const stateInput = request.state.trim();
    const districtInput = request.district.trim();
    if (!stateInput || !districtInput) {
      throw new ValidationError("state and district are required");
    }
    signal?.throwIfAborted();

    const state = await this.locationDirectory.resolveStateName(stateInput);
    const district = await this.locationDirectory.resolveDistrictName(stateInput, districtInput);
    const villages = await this.locationDirectory.listVillages(stateInput, districtInput);
    const village = pickOne(villages, this.random);
    if (village === undefined) {
      throw new LocationNotFoundError(`No villages found for ${district}, ${state}`);
    }
    const { coordinates, source } = await this.resolveCoordinates(village, district);
    const [latitude, longitude] = coordinates;

    const now = this.clock();
    const month = monthInIndia(now);
    const season = classifySeason(month);
    const crop = selectCrop(district, season, this.random);
    const stage = estimateStageByMonth(crop, month, { logger: this.logger });

    const weather = await this.fetchWeather(latitude, longitude, village, district, signal);
    const narrative = await this.requestNarrative(
      {
        crop,
        stage,
        village,
        district,
        latitude,
        longitude,
        weather: {
          temperatureC: weather.observation.temperatureC,
          windSpeedKmh: weather.observation.windSpeedKmh,
          precipitationForecastMm: weather.precipitationForecastMm.slice(
            0,
            PRECIPITATION_WINDOW_DAYS
          )
        }
      },
      signal
    );
    signal?.throwIfAborted();

    const classification = classifyWeather({
      weather: weather.observation,
      crop,
      stage,
      village,
      district
    });

    const record = assembleAlert({
      location: {
        village,
        district,
        state,
        coordinates,
        coordinatesSource: source,
        totalVillagesInDistrict: villages.length
      },
      crop: { name: crop, stage, season },
      weather: weather.observation,
      forecastDays: this.forecastDays,
      classification,
      narrative,
      now
    });

    this.logger.info("alert generated", {
      alertId: record.alertId,
      type: record.alert.type,
      urgency: record.alert.urgency,
      aiGenerated: record.alert.aiGenerated
    });

    return record;
  }

  private async resolveCoordinates(village: string, district: string): Promise<ResolvedCoordinates> {
    try {
      return {
        coordinates: await this.locationDirectory.reverseGeocode(village),
        source: "village"
      };
    } catch (error) {
      if (!(error instanceof LocationNotFoundError)) {
        throw error;
      }
      this.logger.warn("village coordinates unavailable, using district", { village, district });
    }

    try {
      return {
        coordinates: await this.locationDirectory.reverseGeocode(district),
        source: "district"
      };
    } catch (error) {
      if (error instanceof LocationNotFoundError) {
        throw new LocationNotFoundError(`No coordinates found for ${village}, ${district}`);
      }
      throw error;
    }
  }

  private async fetchWeather(
    latitude: number,
    longitude: number,
    village: string,
    district: string,
    signal: AbortSignal | undefined
  ): Promise<FetchedWeather> {
    // Aborting one call when its sibling fails.
    const controller = new AbortController();
    const requestSignal = signal ? AbortSignal.any([controller.signal, signal]) : controller.signal;

    try {
      const [current, forecast] = await Promise.all([
        this.weatherProvider.getCurrentWeather(latitude, longitude, requestSignal),
        this.weatherProvider.getForecast(latitude, longitude, this.forecastDays, requestSignal)
      ]);

      return {
        observation: normalizeObservation({
          temperatureC: current.temperature,
          windSpeedKmh: current.windspeed,
          precipitationNext3DaysMm: sumFirstDays(
            forecast.precipitationSumPerDay,
            PRECIPITATION_WINDOW_DAYS
          )
        }),
        precipitationForecastMm: forecast.precipitationSumPerDay
      };
    } catch (error) {
      controller.abort();
      if (signal?.aborted || error instanceof WeatherUnavailableError) {
        throw error;
      }
      throw new WeatherUnavailableError(
        `Weather data unavailable for ${village}, ${district}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  private async requestNarrative(
    request: NarrativeRequest,
    signal: AbortSignal | undefined
  ): Promise<NarrativeResult | undefined> {
    if (!this.narrativeGenerator?.enabled) {
      return undefined;
    }

    try {
      return await this.narrativeGenerator.generate(request, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      this.logger.warn("AI narrative unavailable, using template message", {
        village: request.village,
        district: request.district,
        error: errorMessage(error)
      });
      return undefined;
    }
  }
}
