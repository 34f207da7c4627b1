import {WeatherCliError} from './errors';

export interface City {
  name: string;
  /** ISO 3166 alpha-2 code, empty when the provider omits it. */
  country: string;
}

export interface WeatherRecord {
  description: string;
  /** °C */
  temperature: number;
  /** °C */
  feelsLike: number;
  /** percent, 0–100 */
  humidity: number;
  /** m/s */
  windSpeed: number;
}

export interface WeatherReport {
  city: City;
  weather: WeatherRecord;
}

/**
 * Anything that can resolve a city name to current conditions.
 * WeatherService is the production implementation.
 */
export interface WeatherProvider {
  getWeather(cityName: string): Promise<WeatherReport>;
}

export type FavouriteWeather =
  | {city: City; ok: true; weather: WeatherRecord}
  | {city: City; ok: false; error: WeatherCliError};

/**
 * Identity key for a city: trimmed and case-folded, so 'Straße' and
 * 'STRASSE' compare equal.
 */
export function normalizeCityName(name: string): string {
  return name.trim().toUpperCase().toLowerCase();
}
