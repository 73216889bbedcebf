/**
 * Weather provider using weatherstack. Units: m = metric, f = fahrenheit, s = scientific.
 * weatherstack answers errors with HTTP 200 and `{ success: false, error: { code, info } }`.
 */
import type { AxiosInstance } from 'axios';
import type { CurrentWeatherParams, ForecastParams, UpstreamPayload } from '@/mcp/tool-contract';
import type { WeatherProvider } from '@/services/providers/weather/weather-provider';
import {
  asRecord,
  fetchJson,
  requireCredential,
  UpstreamError,
  type QueryParams,
} from '@/services/providers/upstream';
import { isRecord } from '@/utils/helpers';

export const WEATHERSTACK_URL = 'http://api.weatherstack.com';

function weatherstackError(error: unknown): string {
  if (isRecord(error)) {
    if (typeof error.info === 'string') return error.info;
    if (error.code !== undefined) return `weatherstack error ${String(error.code)}`;
  }
  return 'weatherstack request failed';
}

export class WeatherstackProvider implements WeatherProvider {
  readonly name = 'weatherstack';

  constructor(
    private readonly http: AxiosInstance,
    private readonly apiKey?: string,
  ) {}

  private async request(endpoint: 'current' | 'forecast', params: QueryParams): Promise<UpstreamPayload> {
    const accessKey = requireCredential(this.apiKey, 'WEATHERSTACK_API_KEY');
    const raw = await fetchJson(this.http, `${WEATHERSTACK_URL}/${endpoint}`, { access_key: accessKey, ...params });
    const payload = asRecord(raw, 'weatherstack');
    if (payload.success === false) throw new UpstreamError(weatherstackError(payload.error));
    return payload;
  }

  async getCurrentWeather(params: CurrentWeatherParams): Promise<UpstreamPayload> {
    return this.request('current', { query: params.location, units: params.units });
  }

  async getForecast(params: ForecastParams): Promise<UpstreamPayload> {
    return this.request('forecast', {
      query: params.location,
      forecast_days: params.forecast_days,
      hourly: params.hourly ? 1 : 0,
      units: params.units,
    });
  }
}
