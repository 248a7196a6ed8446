import type { Season } from "../crop-calendar/constants.js";
import type { RandomSource } from "../crop-calendar/types.js";
import type { Logger } from "../shared/logger.js";
import type { ActionItem, AlertType, DataSource, Urgency } from "./constants.js";

export type Coordinates = readonly [latitude: number, longitude: number];

export interface WeatherObservation {
  temperatureC: number;
  windSpeedKmh: number;
  precipitationNext3DaysMm: number;
}

export interface CurrentWeather {
  temperature?: number | undefined;
  windspeed?: number | undefined;
}

export interface DailyForecast {
  precipitationSumPerDay: number[];
}

export interface WeatherProvider {
  getCurrentWeather(
    latitude: number,
    longitude: number,
    signal?: AbortSignal
  ): Promise<CurrentWeather>;
  getForecast(
    latitude: number,
    longitude: number,
    days: number,
    signal?: AbortSignal
  ): Promise<DailyForecast>;
}

export interface LocationDirectory {
  listVillages(state: string, district: string): Promise<string[]>;
  reverseGeocode(name: string): Promise<Coordinates>;
  resolveStateName(state: string): Promise<string>;
  resolveDistrictName(state: string, district: string): Promise<string>;
}

export interface NarrativeRequest {
  crop: string;
  stage: string;
  village: string;
  district: string;
  latitude: number;
  longitude: number;
  weather: {
    temperatureC: number;
    windSpeedKmh: number;
    precipitationForecastMm: number[];
  };
}

export interface AiAnalysis {
  alert: string;
  impact: string;
  recommendations: string;
}

export interface NarrativeResult extends AiAnalysis {
  enhancedMessage: string;
}

export interface NarrativeGenerator {
  readonly enabled: boolean;
  generate(request: NarrativeRequest, signal?: AbortSignal): Promise<NarrativeResult>;
}

export interface AlertClassificationInput {
  weather: WeatherObservation;
  crop: string;
  stage: string;
  village: string;
  district: string;
}

export interface AlertClassification {
  type: AlertType;
  urgency: Urgency;
  message: string;
  actionItems: readonly ActionItem[];
}

export interface AlertLocation {
  village: string;
  district: string;
  state: string;
  coordinates: Coordinates;
  coordinatesSource: string;
  totalVillagesInDistrict: number;
}

export interface AlertCrop {
  name: string;
  stage: string;
  season: Season;
}

export interface AlertDetails {
  type: AlertType;
  urgency: Urgency;
  message: string;
  actionItems: readonly string[];
  validUntil: string;
  aiGenerated: boolean;
}

export interface AlertWeather {
  forecastDays: number;
  rainProbability: number;
  expectedRainfallMm: number;
  temperatureC: number;
  humidityPercent: number;
  windSpeedKmh: number;
}

export interface AlertRecord {
  readonly alertId: string;
  readonly timestamp: string;
  readonly location: Readonly<AlertLocation>;
  readonly crop: Readonly<AlertCrop>;
  readonly alert: Readonly<AlertDetails>;
  readonly weather: Readonly<AlertWeather>;
  readonly aiAnalysis?: Readonly<AiAnalysis>;
  readonly dataSource: DataSource;
}

export interface AssembleAlertInput {
  location: AlertLocation;
  crop: AlertCrop;
  weather: WeatherObservation;
  forecastDays: number;
  classification: AlertClassification;
  narrative?: NarrativeResult | undefined;
  now?: Date;
}

export interface GenerateAlertRequest {
  state: string;
  district: string;
  signal?: AbortSignal;
}

export interface AlertPipelineServiceOptions {
  locationDirectory: LocationDirectory;
  weatherProvider: WeatherProvider;
  narrativeGenerator?: NarrativeGenerator;
  forecastDays?: number;
  random?: RandomSource;
  clock?: () => Date;
  logger?: Logger;
}
