import type { ZodIssue } from 'zod';

export class AppError extends Error {
  statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
  }
}

export class UnsupportedCropError extends AppError {
  cropType: string;

  constructor(cropType: string) {
    super(`Unsupported crop type: ${cropType}`, 400);
    this.name = 'UnsupportedCropError';
    this.cropType = cropType;
  }
}

export class InvalidFeatureError extends AppError {
  fields: string[];

  constructor(message: string, fields: string[] = []) {
    super(message, 400);
    this.name = 'InvalidFeatureError';
    this.fields = fields;
  }

  static fromIssues(context: string, issues: ZodIssue[]): InvalidFeatureError {
    const fields = issues.map((issue) => issue.path.join('.') || '(root)');
    const details = issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return new InvalidFeatureError(`Invalid ${context}: ${details.join('; ')}`, fields);
  }
}

export class ModelNotReadyError extends AppError {
  constructor(cropType: string) {
    super(`Yield model for ${cropType} is not trained yet`, 503);
    this.name = 'ModelNotReadyError';
  }
}

export class WeatherUnavailableError extends AppError {
  constructor(message: string) {
    super(message, 502);
    this.name = 'WeatherUnavailableError';
  }
}

export class LocationNotFoundError extends AppError {
  constructor(locationId: string) {
    super(`Location not found: ${locationId}`, 404);
    this.name = 'LocationNotFoundError';
  }
}

export class ConfigurationError extends AppError {
  settings: string[];

  constructor(settings: string[]) {
    super(`Invalid configuration: ${settings.join(', ')}`, 500);
    this.name = 'ConfigurationError';
    this.settings = settings;
  }
}

export function statusCodeFor(err: unknown): number {
  return err instanceof AppError ? err.statusCode : 400;
}

export function messageFor(err: unknown): string {
  return err instanceof Error && err.message ? err.message : 'Unknown error';
}
