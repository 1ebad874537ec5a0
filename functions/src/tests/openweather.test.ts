import axios from 'axios';
import MockAdapter from 'axios-mock-adapter';
import {
  WeatherData,
  assessAgriculturalImpact,
  estimateAnnualRainfall,
  fallbackForecast,
  fallbackWeather,
  getForecastData,
  getForecastOrFallback,
  getWeatherAlerts,
  getWeatherData,
  getWeatherOrFallback
} from '../services/openweather';
import { InvalidFeatureError, WeatherUnavailableError } from '../utils/errors';

const mock = new MockAdapter(axios);
const old = process.env.OPENWEATHER_API_KEY;
beforeEach(() => {
  process.env.OPENWEATHER_API_KEY = 'testkey';
});
afterEach(() => {
  mock.reset();
});
afterAll(() => {
  if (old === undefined) delete process.env.OPENWEATHER_API_KEY;
  else process.env.OPENWEATHER_API_KEY = old;
  mock.restore();
});

const currentWeather = {
  name: 'Fresno',
  sys: { country: 'US' },
  main: { temp: 31.5, feels_like: 33, humidity: 40, pressure: 1009 },
  weather: [{ description: 'clear sky' }],
  wind: { speed: 3.2 }
};

describe('OpenWeather wrapper', () => {
  it('maps the current conditions', async () => {
    mock.onGet(/\/weather$/).reply(200, currentWeather);
    const res = await getWeatherData('Fresno');
    expect(res).toMatchObject({
      location: 'Fresno',
      country: 'US',
      temperature: 31.5,
      feelsLike: 33,
      humidity: 40,
      pressure: 1009,
      description: 'clear sky',
      windSpeed: 3.2,
      rainfallAnnual: 850
    });
    expect(mock.history.get[0].params).toEqual({ q: 'Fresno', appid: 'testkey', units: 'metric' });
  });

  it('fails when the supplier errors', async () => {
    mock.onGet(/\/weather$/).reply(500);
    await expect(getWeatherData('Fresno')).rejects.toBeInstanceOf(WeatherUnavailableError);
  });

  it('fails without an API key', async () => {
    delete process.env.OPENWEATHER_API_KEY;
    await expect(getWeatherData('Fresno')).rejects.toThrow('OPENWEATHER_API_KEY not set');
    expect(mock.history.get).toHaveLength(0);
  });

  it('falls back to default readings with a warning', async () => {
    mock.onGet(/\/weather$/).networkError();
    const lookup = await getWeatherOrFallback('Fresno');
    expect(lookup.source).toBe('fallback');
    expect(lookup.weather).toMatchObject({ temperature: 22, humidity: 65, rainfallAnnual: 800, pressure: 1013 });
    expect(lookup.warning).toBe(
      'Live weather unavailable for Fresno; using default values (Weather lookup failed for Fresno: Network Error)'
    );
  });

  it('reports live readings as live', async () => {
    mock.onGet(/\/weather$/).reply(200, currentWeather);
    const lookup = await getWeatherOrFallback('Fresno');
    expect(lookup.source).toBe('live');
    expect(lookup.warning).toBeUndefined();
  });
});

// 2024-06-01T00:00:00Z
const JUNE_FIRST = 1717200000;

const forecast = {
  city: { name: 'Fresno', country: 'US' },
  list: [
    {
      dt: JUNE_FIRST,
      main: { temp: 18, humidity: 70 },
      weather: [{ description: 'light rain' }],
      wind: { speed: 2 },
      rain: { '3h': 1.2 }
    },
    {
      dt: JUNE_FIRST + 3 * 3600,
      main: { temp: 16, humidity: 80 },
      weather: [{ description: 'overcast clouds' }],
      wind: { speed: 1.5 }
    },
    {
      dt: JUNE_FIRST + 24 * 3600,
      main: { temp: 20, humidity: 60 },
      weather: [{ description: 'light rain' }],
      wind: { speed: 3 },
      rain: { '3h': 0.5 }
    }
  ]
};

describe('OpenWeather forecast', () => {
  it('maps forecast steps and totals them by day', async () => {
    mock.onGet(/\/forecast$/).reply(200, forecast);
    const res = await getForecastData('Fresno', 2);
    expect(mock.history.get[0].params).toEqual({ q: 'Fresno', appid: 'testkey', units: 'metric', cnt: 16 });
    expect(res.location).toBe('Fresno');
    expect(res.entries[1]).toEqual({
      time: '2024-06-01T03:00:00.000Z',
      temperature: 16,
      humidity: 80,
      description: 'overcast clouds',
      windSpeed: 1.5,
      precipitation: 0
    });
    expect(res.daily).toEqual([
      {
        date: '2024-06-01',
        minTemperature: 16,
        maxTemperature: 18,
        avgTemperature: 17,
        avgHumidity: 75,
        precipitation: 1.2
      },
      {
        date: '2024-06-02',
        minTemperature: 20,
        maxTemperature: 20,
        avgTemperature: 20,
        avgHumidity: 60,
        precipitation: 0.5
      }
    ]);
  });

  it('keeps only the requested days', async () => {
    mock.onGet(/\/forecast$/).reply(200, {
      ...forecast,
      list: Array.from({ length: 12 }, (_, i) => ({ ...forecast.list[1], dt: JUNE_FIRST + i * 3 * 3600 }))
    });
    const res = await getForecastData('Fresno', 1);
    expect(res.entries).toHaveLength(8);
    expect(res.daily).toHaveLength(1);
  });

  it('rejects a malformed forecast', async () => {
    mock.onGet(/\/forecast$/).reply(200, { city: { name: 'Fresno' }, list: [{ dt: JUNE_FIRST }] });
    await expect(getForecastData('Fresno', 1)).rejects.toThrow('Unexpected forecast response for Fresno');
  });

  it('falls back to flat default readings with a warning', async () => {
    mock.onGet(/\/forecast$/).reply(503);
    const lookup = await getForecastOrFallback('Fresno', 2);
    expect(lookup.source).toBe('fallback');
    expect(lookup.forecast.entries).toHaveLength(16);
    expect(lookup.forecast.entries[0]).toMatchObject({ temperature: 22, humidity: 65, precipitation: 0 });
    expect(lookup.warning).toBe(
      'Live forecast unavailable for Fresno; using default values ' +
        '(Forecast lookup failed for Fresno: Request failed with status code 503)'
    );
  });

  it('rejects day counts the supplier cannot cover', async () => {
    await expect(getForecastOrFallback('Fresno', 6)).rejects.toBeInstanceOf(InvalidFeatureError);
    await expect(getForecastOrFallback('Fresno', 0)).rejects.toBeInstanceOf(InvalidFeatureError);
    expect(mock.history.get).toHaveLength(0);
  });
});

describe('fallbackForecast', () => {
  it('steps every three hours from the start time', () => {
    const res = fallbackForecast('Lyon', 1, new Date(JUNE_FIRST * 1000));
    expect(res.entries.map((e) => e.time.slice(11, 16))).toEqual([
      '00:00',
      '03:00',
      '06:00',
      '09:00',
      '12:00',
      '15:00',
      '18:00',
      '21:00'
    ]);
    expect(res.daily).toEqual([
      {
        date: '2024-06-01',
        minTemperature: 22,
        maxTemperature: 22,
        avgTemperature: 22,
        avgHumidity: 65,
        precipitation: 0
      }
    ]);
  });
});

describe('estimateAnnualRainfall', () => {
  it('uses regional keywords', () => {
    expect(estimateAnnualRainfall('Phoenix, Arizona')).toBe(250);
    expect(estimateAnnualRainfall('Honolulu, Hawaii')).toBe(1850);
    expect(estimateAnnualRainfall('Seattle')).toBe(1150);
    expect(estimateAnnualRainfall('Lyon')).toBe(850);
  });
});

describe('agricultural impact', () => {
  const mild: WeatherData = { ...fallbackWeather('Lyon'), temperature: 22, humidity: 60, description: 'few clouds' };

  it('rates each crop against its preferred conditions', () => {
    const impact = assessAgriculturalImpact(mild);
    expect(impact.Wheat).toEqual({
      impact: 'Favorable',
      temperatureImpact: 'Optimal',
      humidityImpact: 'Good',
      recommendation: 'Weather conditions are favorable for normal farming activities'
    });
    expect(impact.Rice).toMatchObject({ impact: 'Moderate', temperatureImpact: 'Suboptimal' });
  });

  it('keeps the top three recommendations', () => {
    const storm: WeatherData = { ...mild, temperature: 38, humidity: 85, description: 'heavy rain' };
    expect(assessAgriculturalImpact(storm).Wheat).toEqual({
      impact: 'Unfavorable',
      temperatureImpact: 'Poor',
      humidityImpact: 'Suboptimal',
      recommendation:
        'Monitor for waterlogging and fungal diseases | Ensure proper drainage in fields | ' +
        'Consider additional irrigation during hot weather'
    });
  });

  it('raises heat, frost and rain alerts', () => {
    expect(getWeatherAlerts({ ...mild, temperature: 38, description: 'heavy rain' }).map((a) => a.type)).toEqual([
      'Heat Warning',
      'Heavy Rain Warning'
    ]);
    expect(getWeatherAlerts({ ...mild, temperature: 2 }).map((a) => a.type)).toEqual(['Frost Alert']);
    expect(getWeatherAlerts({ ...mild, description: 'Thunderstorm' })).toHaveLength(1);
    expect(getWeatherAlerts(mild)).toEqual([]);
  });
});
