import {z} from 'zod';
import {ConfigError} from './errors';

export const API_KEY_ENV_VAR = 'OPENWEATHER_API_KEY';
export const DEFAULT_BASE_URL =
  'https://api.openweathermap.org/data/2.5/weather';
export const DEFAULT_TIMEOUT_MS = 5000;

export interface OpenWeatherConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

const envSchema = z.object({
  [API_KEY_ENV_VAR]: z.string().trim().min(1).optional(),
  OPENWEATHER_BASE_URL: z
    .string()
    .url({message: 'OPENWEATHER_BASE_URL must be an absolute URL'})
    .default(DEFAULT_BASE_URL),
  OPENWEATHER_TIMEOUT_MS: z.coerce
    .number({invalid_type_error: 'OPENWEATHER_TIMEOUT_MS must be a number'})
    .int()
    .positive()
    .default(DEFAULT_TIMEOUT_MS),
});

/**
 * Read the OpenWeather settings from an environment map (normally
 * `process.env`, already populated from .env by dotenv).
 *
 * Blank values count as unset so that an empty `OPENWEATHER_API_KEY=` line in
 * .env still reports the missing key.
 */
export function loadOpenWeatherConfig(
  env: Record<string, string | undefined> = process.env,
): OpenWeatherConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') present[key] = value;
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const apiKey = parsed.data[API_KEY_ENV_VAR];
  if (!apiKey) {
    throw new ConfigError(
      `API key not found. Please set the ${API_KEY_ENV_VAR} environment variable.`,
    );
  }

  return {
    apiKey,
    baseUrl: parsed.data.OPENWEATHER_BASE_URL,
    timeoutMs: parsed.data.OPENWEATHER_TIMEOUT_MS,
  };
}
