import type {City, WeatherReport} from '../models';

export function titleCase(text: string): string {
  return text
    .toLowerCase()
    .replace(/(^|[\s/-])(\p{L})/gu, (_match, lead: string, letter: string) =>
      lead + letter.toUpperCase(),
    );
}

export function formatLocation(city: City): string {
  return city.country ? `${city.name}, ${city.country}` : city.name;
}

export function formatWeather({city, weather}: WeatherReport): string {
  const location = formatLocation(city);
  return [
    `Weather for ${location}:`,
    '-'.repeat(location.length + 13),
    `  Description : ${titleCase(weather.description)}`,
    `  Temperature : ${weather.temperature.toFixed(1)} °C`,
    `  Feels like  : ${weather.feelsLike.toFixed(1)} °C`,
    `  Humidity    : ${weather.humidity}%`,
    `  Wind speed  : ${weather.windSpeed.toFixed(1)} m/s`,
  ].join('\n');
}
