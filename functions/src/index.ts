import * as functions from 'firebase-functions';
import { logger } from 'firebase-functions';
import express, { Response } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { GROWTH_STAGES, parseCropType } from './services/crops';
import { analyzeCropSuitability, generateFertilizerPlan } from './services/cropSuitability';
import { generateTrainingTable, getHistoricalYieldData, getRegionalYieldData } from './services/dataGenerator';
import { resolveLocation } from './services/locations';
import { getYieldModelStore, parseTrainingRows } from './services/modelStore';
import {
  MAX_FORECAST_DAYS,
  WeatherLookup,
  assessAgriculturalImpact,
  getForecastOrFallback,
  getWeatherAlerts,
  getWeatherOrFallback
} from './services/openweather';
import { generateRecommendations, generateWeeklySchedule } from './services/recommender';
import { analyzeSoilHealth, parseSoilValues } from './services/soilAnalyzer';
import { getFeatureImportance, predictYield } from './services/yieldPredictor';
import { getConfig } from './utils/config';
import { messageFor, statusCodeFor } from './utils/errors';
import { blankToUndefined, numeric, optionalNumeric, optionalText, parseWith } from './utils/validation';

const app = express();
app.use(express.json({ limit: '1mb' }));
const upload = multer();

function sendError(res: Response, route: string, err: unknown) {
  const status = statusCodeFor(err);
  logger.error('Request failed', { route, status, error: messageFor(err) });
  res.status(status).json({ error: messageFor(err) });
}

const WEATHER_FIELDS = ['temperature', 'rainfall', 'humidity'] as const;

// Form posts send booleans as text.
const flag = z.preprocess(
  blankToUndefined,
  z.union([z.boolean(), z.enum(['true', 'false']).transform((value) => value === 'true')]).default(false)
);

const predictBody = z
  .object({
    cropType: z.string(),
    farmArea: optionalNumeric(z.number().min(0)),
    features: z.record(z.unknown()).optional(),
    location: optionalText(),
    locationId: optionalText(),
    useCurrentWeather: flag
  })
  .passthrough();

const retrainBody = z.object({
  cropType: z.string(),
  rows: z.array(z.unknown()).optional(),
  seed: optionalNumeric(z.number().int()),
  samples: optionalNumeric(z.number().int().min(20))
});

const soilBody = z
  .object({
    cropType: z.string(),
    soil: z.record(z.unknown()).optional()
  })
  .passthrough();

const scheduleQuery = z.object({ cropType: z.string(), growthStage: z.enum(GROWTH_STAGES) });
const weatherQuery = z.object({ location: optionalText(), locationId: optionalText() });
const forecastQuery = weatherQuery.extend({
  days: optionalNumeric(z.number().int().min(1).max(MAX_FORECAST_DAYS))
});
const trendsQuery = z.object({ seed: optionalNumeric(z.number().int()) });

app.post('/predictYield', upload.none(), async (req, res) => {
  try {
    const { cropType, farmArea, features, location, locationId, useCurrentWeather, ...flat } = parseWith(
      predictBody,
      req.body ?? {},
      'prediction request'
    );
    parseCropType(cropType);
    // Form posts carry the feature columns at the top level.
    const supplied: Record<string, unknown> = features ?? flat;
    const warnings: string[] = [];

    let weather: WeatherLookup | undefined;
    if (useCurrentWeather) {
      weather = await getWeatherOrFallback(await resolveLocation({ location, locationId }));
      if (weather.warning) warnings.push(weather.warning);
    } else if (WEATHER_FIELDS.some((field) => supplied[field] === undefined || supplied[field] === '')) {
      warnings.push('Weather readings missing; default values were used');
    }

    const merged = weather
      ? {
          ...supplied,
          temperature: weather.weather.temperature,
          humidity: weather.weather.humidity,
          rainfall: weather.weather.rainfallAnnual
        }
      : supplied;

    const prediction = predictYield(getYieldModelStore(), { cropType, farmArea, features: merged });
    res.json({ prediction, weather: weather?.weather, warnings });
  } catch (err) {
    sendError(res, 'predictYield', err);
  }
});

app.post('/retrainModel', upload.none(), (req, res) => {
  try {
    const body = parseWith(retrainBody, req.body ?? {}, 'retrain request');
    const cropType = parseCropType(body.cropType);
    const config = getConfig();
    const rows = body.rows
      ? parseTrainingRows(cropType, body.rows)
      : generateTrainingTable(cropType, body.samples ?? config.samplesPerCrop, {
          seed: body.seed ?? config.trainingSeed
        });
    const metrics = getYieldModelStore().retrain(cropType, rows);
    res.json({ cropType, metrics });
  } catch (err) {
    sendError(res, 'retrainModel', err);
  }
});

app.get('/modelPerformance/:cropType', (req, res) => {
  try {
    const cropType = parseCropType(req.params.cropType);
    const model = getYieldModelStore().getModel(cropType);
    res.json({ cropType, metrics: model.metrics, featureImportance: getFeatureImportance(model) });
  } catch (err) {
    sendError(res, 'modelPerformance', err);
  }
});

app.post('/analyzeSoil', upload.none(), (req, res) => {
  try {
    res.json(analyzeSoilHealth(parseSoilValues(req.body ?? {})));
  } catch (err) {
    sendError(res, 'analyzeSoil', err);
  }
});

app.post('/cropSuitability', upload.none(), (req, res) => {
  try {
    const { cropType, soil, ...flat } = parseWith(soilBody, req.body ?? {}, 'suitability request');
    res.json(analyzeCropSuitability(parseSoilValues(soil ?? flat), parseCropType(cropType)));
  } catch (err) {
    sendError(res, 'cropSuitability', err);
  }
});

app.post('/fertilizerPlan', upload.none(), (req, res) => {
  try {
    const { cropType, soil, ...flat } = parseWith(soilBody, req.body ?? {}, 'fertilizer request');
    const targetYield = parseWith(numeric(z.number().min(0)), flat.targetYield, 'targetYield');
    res.json(generateFertilizerPlan(parseSoilValues(soil ?? flat), parseCropType(cropType), targetYield));
  } catch (err) {
    sendError(res, 'fertilizerPlan', err);
  }
});

app.post('/recommendations', upload.none(), (req, res) => {
  try {
    res.json(generateRecommendations(req.body ?? {}));
  } catch (err) {
    sendError(res, 'recommendations', err);
  }
});

app.get('/weeklySchedule', (req, res) => {
  try {
    const query = parseWith(scheduleQuery, req.query, 'schedule query');
    res.json(generateWeeklySchedule(parseCropType(query.cropType), query.growthStage));
  } catch (err) {
    sendError(res, 'weeklySchedule', err);
  }
});

app.get('/weather', async (req, res) => {
  try {
    const query = parseWith(weatherQuery, req.query, 'weather query');
    const lookup = await getWeatherOrFallback(await resolveLocation(query));
    res.json({
      weather: lookup.weather,
      source: lookup.source,
      warnings: lookup.warning ? [lookup.warning] : [],
      impact: assessAgriculturalImpact(lookup.weather),
      alerts: getWeatherAlerts(lookup.weather)
    });
  } catch (err) {
    sendError(res, 'weather', err);
  }
});

app.get('/forecast', async (req, res) => {
  try {
    const { days, ...query } = parseWith(forecastQuery, req.query, 'forecast query');
    const lookup = await getForecastOrFallback(await resolveLocation(query), days);
    res.json({
      forecast: lookup.forecast,
      source: lookup.source,
      warnings: lookup.warning ? [lookup.warning] : []
    });
  } catch (err) {
    sendError(res, 'forecast', err);
  }
});

app.get('/yieldTrends', (req, res) => {
  try {
    const { seed } = parseWith(trendsQuery, req.query, 'trends query');
    res.json({ historical: getHistoricalYieldData(seed), regional: getRegionalYieldData(seed) });
  } catch (err) {
    sendError(res, 'yieldTrends', err);
  }
});

export { app };
export const api = functions.https.onRequest(app);
