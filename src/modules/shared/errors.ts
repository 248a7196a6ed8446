export class LocationNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LocationNotFoundError";
  }
}

export class WeatherUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WeatherUnavailableError";
  }
}

export class InvalidDateRangeError extends Error {
  constructor(plantDate: string, currentDate: string) {
    super(`Planting date ${plantDate} is after current date ${currentDate}`);
    this.name = "InvalidDateRangeError";
  }
}

export class InvalidCropDefinitionError extends Error {
  constructor(cropName: string, reason: string) {
    super(`Crop "${cropName}" has an invalid definition: ${reason}`);
    this.name = "InvalidCropDefinitionError";
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}
