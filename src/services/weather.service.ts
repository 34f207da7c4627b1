/**
 * WeatherService: OpenWeather current-weather client.
 *
 * Queries `<baseUrl>?q=<city>&appid=<key>&units=metric` and normalizes the
 * payload into a WeatherReport. No retries; failures surface as
 * NotFoundError (404) or TransportError (everything else).
 */
import {BindingScope, inject, injectable} from '@loopback/core';
import http from 'http';
import https from 'https';
import {z} from 'zod';
import type {OpenWeatherConfig} from '../config';
import {NotFoundError, TransportError, ValidationError} from '../errors';
import {WeatherCliBindings} from '../keys';
import type {WeatherProvider, WeatherReport} from '../models';

const currentWeatherSchema = z.object({
  name: z.string().optional(),
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    humidity: z.number(),
  }),
  weather: z.array(z.object({description: z.string()})).default([]),
  wind: z.object({speed: z.number().optional()}).default({}),
  sys: z.object({country: z.string().optional()}).default({}),
});

interface RawResponse {
  statusCode: number;
  body: string;
}

@injectable({scope: BindingScope.SINGLETON})
export class WeatherService implements WeatherProvider {
  private baseUrl: string;
  private apiKey: string;
  private timeoutMs: number;

  constructor(
    @inject(WeatherCliBindings.CONFIG)
    config: OpenWeatherConfig,
  ) {
    this.baseUrl = config.baseUrl;
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs;
  }

  /**
   * Get current weather for a city, as resolved by the provider.
   */
  async getWeather(cityName: string): Promise<WeatherReport> {
    const city = cityName.trim();
    if (!city) {
      throw new ValidationError('City name must not be empty.');
    }

    const url = new URL(this.baseUrl);
    url.searchParams.set('q', city);
    url.searchParams.set('appid', this.apiKey);
    url.searchParams.set('units', 'metric');

    const res = await this.request(url);

    if (res.statusCode === 404) {
      throw new NotFoundError(city);
    }
    if (res.statusCode !== 200) {
      console.error(
        `[WeatherService] ${city}: OpenWeather returned ${res.statusCode}`,
      );
      throw new TransportError(
        `OpenWeather API returned status ${res.statusCode}: ${res.body.slice(0, 500)}`,
        res.statusCode,
      );
    }

    return this.normalize(city, res.body);
  }

  private normalize(requested: string, body: string): WeatherReport {
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (err) {
      throw new TransportError(
        'Unexpected API response format: body is not JSON',
        200,
        {cause: err},
      );
    }

    const parsed = currentWeatherSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new TransportError(
        `Unexpected API response format: ${issue.path.join('.')} ${issue.message}`,
        200,
        {cause: parsed.error},
      );
    }

    const data = parsed.data;
    return {
      city: {
        name: data.name || requested,
        country: data.sys.country ?? '',
      },
      weather: {
        description: data.weather[0]?.description ?? 'N/A',
        temperature: data.main.temp,
        feelsLike: data.main.feels_like,
        humidity: Math.round(data.main.humidity),
        windSpeed: data.wind.speed ?? 0,
      },
    };
  }

  /**
   * Plain GET over http/https, resolving with status and body for any
   * response and rejecting with TransportError on socket failure or timeout.
   */
  private request(url: URL): Promise<RawResponse> {
    const isHttps = url.protocol === 'https:';
    const transport = isHttps ? https : http;

    return new Promise((resolve, reject) => {
      const req = transport.request(
        {
          hostname: url.hostname,
          port: url.port || (isHttps ? 443 : 80),
          path: url.pathname + url.search,
          method: 'GET',
          headers: {Accept: 'application/json'},
        },
        res => {
          let data = '';
          res.setEncoding('utf8');
          res.on('data', (chunk: string) => (data += chunk));
          res.on('end', () => {
            resolve({statusCode: res.statusCode ?? 0, body: data});
          });
          res.on('error', err => {
            reject(
              new TransportError(
                `Network error while contacting OpenWeather: ${err.message}`,
                undefined,
                {cause: err},
              ),
            );
          });
        },
      );

      req.on('error', err => {
        console.error(`[WeatherService] Request to ${url.host} failed:`, err.message);
        reject(
          new TransportError(
            `Network error while contacting OpenWeather: ${err.message}`,
            undefined,
            {cause: err},
          ),
        );
      });
      req.setTimeout(this.timeoutMs, () => {
        req.destroy(
          new Error(`OpenWeather request timed out (${this.timeoutMs}ms)`),
        );
      });
      req.end();
    });
  }
}
