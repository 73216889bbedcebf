// src/services/providers/weather/weather-provider.ts
import type { CurrentWeatherParams, ForecastParams, UpstreamPayload } from '@/mcp/tool-contract';

export interface WeatherProvider {
  name: string;
  getCurrentWeather(params: CurrentWeatherParams): Promise<UpstreamPayload>;
  getForecast(params: ForecastParams): Promise<UpstreamPayload>;
}
