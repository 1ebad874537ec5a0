import axios from 'axios';
import { logger } from 'firebase-functions';
import { z } from 'zod';
import { CropType, getCropProfile } from './crops';
import { FALLBACK_WEATHER } from './features';
import { getConfig } from '../utils/config';
import { InvalidFeatureError, WeatherUnavailableError, messageFor } from '../utils/errors';

export type WeatherData = {
  location: string;
  country: string;
  temperature: number;
  feelsLike: number;
  humidity: number;
  pressure: number;
  description: string;
  windSpeed: number;
  rainfallAnnual: number;
  observedAt: string;
};

export type WeatherSource = 'live' | 'fallback';

export type WeatherLookup = {
  weather: WeatherData;
  source: WeatherSource;
  warning?: string;
};

export type ForecastEntry = {
  time: string;
  temperature: number;
  humidity: number;
  description: string;
  windSpeed: number;
  precipitation: number;
};

export type DailyForecast = {
  date: string;
  minTemperature: number;
  maxTemperature: number;
  avgTemperature: number;
  avgHumidity: number;
  precipitation: number;
};

export type ForecastData = {
  location: string;
  country: string;
  entries: ForecastEntry[];
  daily: DailyForecast[];
};

export type ForecastLookup = {
  forecast: ForecastData;
  source: WeatherSource;
  warning?: string;
};

export type TemperatureImpact = 'Optimal' | 'Suboptimal' | 'Poor';
export type HumidityImpact = 'Good' | 'Suboptimal';
export type OverallImpact = 'Favorable' | 'Moderate' | 'Unfavorable';

export type CropWeatherImpact = {
  impact: OverallImpact;
  temperatureImpact: TemperatureImpact;
  humidityImpact: HumidityImpact;
  recommendation: string;
};

export type WeatherAlert = {
  type: 'Heat Warning' | 'Frost Alert' | 'Heavy Rain Warning';
  severity: 'High' | 'Medium';
  message: string;
  recommendations: string[];
};

const currentWeatherSchema = z.object({
  name: z.string(),
  sys: z.object({ country: z.string().default('') }),
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    humidity: z.number(),
    pressure: z.number()
  }),
  weather: z.array(z.object({ description: z.string() })).min(1),
  wind: z.object({ speed: z.number() })
});

const forecastSchema = z.object({
  city: z.object({ name: z.string(), country: z.string().default('') }),
  list: z.array(
    z.object({
      dt: z.number(),
      main: z.object({ temp: z.number(), humidity: z.number() }),
      weather: z.array(z.object({ description: z.string() })).min(1),
      wind: z.object({ speed: z.number() }),
      rain: z.object({ '3h': z.number().optional() }).optional()
    })
  )
});

// The supplier forecasts five days ahead in three-hour steps.
export const MAX_FORECAST_DAYS = 5;
const ENTRIES_PER_DAY = 8;
const STEP_MS = (24 / ENTRIES_PER_DAY) * 60 * 60 * 1000;

// Keyword table only; no historical rainfall source is wired in.
const RAINFALL_BY_KEYWORD: ReadonlyArray<{ keywords: string[]; rainfallMm: number }> = [
  { keywords: ['desert', 'arizona', 'nevada'], rainfallMm: 250 },
  { keywords: ['tropical', 'florida', 'hawaii'], rainfallMm: 1850 },
  { keywords: ['seattle', 'oregon', 'washington'], rainfallMm: 1150 }
];
const DEFAULT_ANNUAL_RAINFALL_MM = 850;

export function estimateAnnualRainfall(location: string): number {
  const name = location.toLowerCase();
  const match = RAINFALL_BY_KEYWORD.find((entry) => entry.keywords.some((k) => name.includes(k)));
  return match ? match.rainfallMm : DEFAULT_ANNUAL_RAINFALL_MM;
}

async function fetchOpenWeather(
  path: '/weather' | '/forecast',
  location: string,
  extraParams: Record<string, number> = {}
): Promise<unknown> {
  const { openWeatherApiKey, openWeatherBaseUrl, weatherTimeoutMs } = getConfig();
  if (!openWeatherApiKey) {
    throw new WeatherUnavailableError('OPENWEATHER_API_KEY not set');
  }
  try {
    const { data } = await axios.get<unknown>(`${openWeatherBaseUrl}${path}`, {
      params: { q: location, appid: openWeatherApiKey, units: 'metric', ...extraParams },
      timeout: weatherTimeoutMs
    });
    return data;
  } catch (err) {
    const what = path === '/forecast' ? 'Forecast' : 'Weather';
    throw new WeatherUnavailableError(`${what} lookup failed for ${location}: ${messageFor(err)}`);
  }
}

export async function getWeatherData(location: string): Promise<WeatherData> {
  const parsed = currentWeatherSchema.safeParse(await fetchOpenWeather('/weather', location));
  if (!parsed.success) {
    throw new WeatherUnavailableError(`Unexpected weather response for ${location}`);
  }
  const { name, sys, main, weather, wind } = parsed.data;
  return {
    location: name,
    country: sys.country,
    temperature: main.temp,
    feelsLike: main.feels_like,
    humidity: main.humidity,
    pressure: main.pressure,
    description: weather[0].description,
    windSpeed: wind.speed,
    rainfallAnnual: estimateAnnualRainfall(location),
    observedAt: new Date().toISOString()
  };
}

export function fallbackWeather(location: string): WeatherData {
  return {
    location,
    country: '',
    temperature: FALLBACK_WEATHER.temperature,
    feelsLike: FALLBACK_WEATHER.temperature,
    humidity: FALLBACK_WEATHER.humidity,
    pressure: FALLBACK_WEATHER.pressure,
    description: FALLBACK_WEATHER.description,
    windSpeed: 0,
    rainfallAnnual: FALLBACK_WEATHER.rainfall,
    observedAt: new Date().toISOString()
  };
}

/** Never rejects for supplier failures; the caller surfaces `warning` instead. */
export async function getWeatherOrFallback(location: string): Promise<WeatherLookup> {
  try {
    return { weather: await getWeatherData(location), source: 'live' };
  } catch (err) {
    if (!(err instanceof WeatherUnavailableError)) throw err;
    logger.warn('Weather unavailable, using fallback values', { location, reason: err.message });
    return {
      weather: fallbackWeather(location),
      source: 'fallback',
      warning: `Live weather unavailable for ${location}; using default values (${err.message})`
    };
  }
}

const round1 = (value: number) => Math.round(value * 10) / 10;
const mean = (values: number[]) => values.reduce((sum, v) => sum + v, 0) / values.length;

/** Groups forecast steps by UTC calendar day. */
export function summarizeForecastByDay(entries: readonly ForecastEntry[]): DailyForecast[] {
  const byDay = new Map<string, ForecastEntry[]>();
  for (const entry of entries) {
    const date = entry.time.slice(0, 10);
    byDay.set(date, [...(byDay.get(date) ?? []), entry]);
  }
  return [...byDay].map(([date, day]) => {
    const temps = day.map((e) => e.temperature);
    return {
      date,
      minTemperature: Math.min(...temps),
      maxTemperature: Math.max(...temps),
      avgTemperature: round1(mean(temps)),
      avgHumidity: round1(mean(day.map((e) => e.humidity))),
      precipitation: round1(day.reduce((sum, e) => sum + e.precipitation, 0))
    };
  });
}

function checkForecastDays(days: number): void {
  if (!Number.isInteger(days) || days < 1 || days > MAX_FORECAST_DAYS) {
    throw new InvalidFeatureError(`Forecast days must be between 1 and ${MAX_FORECAST_DAYS}`, ['days']);
  }
}

export async function getForecastData(location: string, days = MAX_FORECAST_DAYS): Promise<ForecastData> {
  checkForecastDays(days);
  const steps = days * ENTRIES_PER_DAY;
  const parsed = forecastSchema.safeParse(await fetchOpenWeather('/forecast', location, { cnt: steps }));
  if (!parsed.success) {
    throw new WeatherUnavailableError(`Unexpected forecast response for ${location}`);
  }
  const entries = parsed.data.list.slice(0, steps).map((item) => ({
    time: new Date(item.dt * 1000).toISOString(),
    temperature: item.main.temp,
    humidity: item.main.humidity,
    description: item.weather[0].description,
    windSpeed: item.wind.speed,
    precipitation: item.rain?.['3h'] ?? 0
  }));
  return {
    location: parsed.data.city.name,
    country: parsed.data.city.country,
    entries,
    daily: summarizeForecastByDay(entries)
  };
}

/** Flat default readings in three-hour steps from `start`. */
export function fallbackForecast(location: string, days = MAX_FORECAST_DAYS, start = new Date()): ForecastData {
  const entries = Array.from({ length: days * ENTRIES_PER_DAY }, (_, i) => ({
    time: new Date(start.getTime() + i * STEP_MS).toISOString(),
    temperature: FALLBACK_WEATHER.temperature,
    humidity: FALLBACK_WEATHER.humidity,
    description: FALLBACK_WEATHER.description,
    windSpeed: 0,
    precipitation: 0
  }));
  return { location, country: '', entries, daily: summarizeForecastByDay(entries) };
}

export async function getForecastOrFallback(location: string, days = MAX_FORECAST_DAYS): Promise<ForecastLookup> {
  checkForecastDays(days);
  try {
    return { forecast: await getForecastData(location, days), source: 'live' };
  } catch (err) {
    if (!(err instanceof WeatherUnavailableError)) throw err;
    logger.warn('Forecast unavailable, using fallback values', { location, reason: err.message });
    return {
      forecast: fallbackForecast(location, days),
      source: 'fallback',
      warning: `Live forecast unavailable for ${location}; using default values (${err.message})`
    };
  }
}

function weatherRecommendations(crop: CropType, weather: WeatherData, impact: OverallImpact): string {
  const { temperature, humidity } = weather;
  const description = weather.description.toLowerCase();
  const out: string[] = [];

  if (description.includes('rain')) {
    out.push('Monitor for waterlogging and fungal diseases', 'Ensure proper drainage in fields');
  }
  if (temperature > 30) {
    out.push('Consider additional irrigation during hot weather', 'Monitor plants for heat stress');
  } else if (temperature < 15) {
    out.push('Protect crops from potential frost damage', 'Consider covering sensitive plants');
  }
  if (humidity > 80) {
    out.push('Increase ventilation to prevent fungal growth', 'Monitor for pest activity in high humidity');
  } else if (humidity < 50) {
    out.push('Consider supplemental irrigation', 'Monitor soil moisture levels closely');
  }
  if (impact === 'Unfavorable') {
    out.push(`Consider postponing field activities for ${crop}`, 'Implement protective measures immediately');
  }
  if (!out.length) out.push('Weather conditions are favorable for normal farming activities');
  return out.slice(0, 3).join(' | ');
}

export function assessCropWeatherImpact(crop: CropType, weather: WeatherData): CropWeatherImpact {
  const { temperature: [tMin, tMax], humidity: [hMin, hMax] } = getCropProfile(crop).optimalConditions;
  const t = weather.temperature;
  const h = weather.humidity;

  let temperatureImpact: TemperatureImpact = 'Suboptimal';
  if (t >= tMin && t <= tMax) temperatureImpact = 'Optimal';
  else if (t < tMin - 5 || t > tMax + 5) temperatureImpact = 'Poor';

  const humidityImpact: HumidityImpact = h >= hMin && h <= hMax ? 'Good' : 'Suboptimal';

  let impact: OverallImpact = 'Moderate';
  if (temperatureImpact === 'Optimal' && humidityImpact === 'Good') impact = 'Favorable';
  else if (temperatureImpact === 'Poor') impact = 'Unfavorable';

  return { impact, temperatureImpact, humidityImpact, recommendation: weatherRecommendations(crop, weather, impact) };
}

export function assessAgriculturalImpact(weather: WeatherData): Record<CropType, CropWeatherImpact> {
  return {
    Wheat: assessCropWeatherImpact('Wheat', weather),
    Corn: assessCropWeatherImpact('Corn', weather),
    Rice: assessCropWeatherImpact('Rice', weather),
    Soybeans: assessCropWeatherImpact('Soybeans', weather)
  };
}

export function getWeatherAlerts(weather: WeatherData): WeatherAlert[] {
  const alerts: WeatherAlert[] = [];
  if (weather.temperature > 35) {
    alerts.push({
      type: 'Heat Warning',
      severity: 'High',
      message: 'Extreme heat conditions. Take precautions for crops and livestock.',
      recommendations: ['Increase irrigation', 'Provide shade for animals', 'Avoid field work during peak hours']
    });
  } else if (weather.temperature < 5) {
    alerts.push({
      type: 'Frost Alert',
      severity: 'High',
      message: 'Freezing temperatures expected. Protect sensitive crops.',
      recommendations: ['Cover tender plants', 'Use frost protection methods', 'Harvest mature crops']
    });
  }

  const description = weather.description.toLowerCase();
  if (description.includes('heavy rain') || description.includes('thunderstorm')) {
    alerts.push({
      type: 'Heavy Rain Warning',
      severity: 'Medium',
      message: 'Heavy rainfall expected. Prepare for potential flooding.',
      recommendations: ['Check drainage systems', 'Secure loose equipment', 'Monitor soil erosion']
    });
  }
  return alerts;
}
