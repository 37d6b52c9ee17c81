/**
 * Current conditions from OpenWeatherMap
 */

import axios, { AxiosInstance } from 'axios';
import { classifyProviderError, NotFoundError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('weather');

export interface WeatherReport {
  location: string;
  description: string;
  temperatureC: number;
  feelsLikeC: number;
  humidity: number;
  windKph: number;
}

interface OpenWeatherResponse {
  name?: string;
  weather?: Array<{ description?: string }>;
  main?: { temp?: number; feels_like?: number; humidity?: number };
  wind?: { speed?: number };
}

export class WeatherService {
  private client: AxiosInstance;

  constructor(apiKey: string, private readonly defaultLocation: string, client?: AxiosInstance) {
    this.client = client ?? axios.create({
      baseURL: 'https://api.openweathermap.org/data/2.5',
      params: { appid: apiKey, units: 'metric' },
      timeout: 10000
    });
  }

  async current(location?: string): Promise<WeatherReport> {
    const city = location?.trim() || this.defaultLocation;
    let data: OpenWeatherResponse;
    try {
      const response = await this.client.get<OpenWeatherResponse>('/weather', { params: { q: city } });
      data = response.data;
    } catch (error) {
      const classified = classifyProviderError(error, `Weather lookup (${city})`);
      log.debug({ err: error, city, code: classified.code }, 'Weather request failed');
      throw classified;
    }

    if (!data.main || data.main.temp === undefined) {
      throw new NotFoundError(`No weather data for "${city}"`);
    }

    return {
      location: data.name ?? city,
      description: data.weather?.[0]?.description ?? 'unknown conditions',
      temperatureC: Math.round(data.main.temp),
      feelsLikeC: Math.round(data.main.feels_like ?? data.main.temp),
      humidity: data.main.humidity ?? 0,
      windKph: Math.round((data.wind?.speed ?? 0) * 3.6)
    };
  }
}

export function formatWeather(report: WeatherReport): string {
  return `${report.location}: ${report.temperatureC}°C (feels like ${report.feelsLikeC}°C), ${report.description}, humidity ${report.humidity}%, wind ${report.windKph} km/h`;
}
