#!/usr/bin/env node
import 'dotenv/config';
import {
  WeatherCliApplication,
  WeatherCliApplicationConfig,
} from './application';
import {ConfigError} from './errors';
import {WeatherCliBindings} from './keys';

export * from './application';
export * from './config';
export * from './errors';
export * from './keys';
export * from './models';
export * from './services/favourites.service';
export * from './services/weather.service';

export async function main(options: WeatherCliApplicationConfig = {}) {
  const app = new WeatherCliApplication(options);
  const config = await app.get(WeatherCliBindings.CONFIG);
  console.log(
    `[WeatherCli] OpenWeather endpoint: ${config.baseUrl} (timeout: ${config.timeoutMs}ms)`,
  );

  await app.start();
  const menu = await app.get(WeatherCliBindings.MENU);
  await menu.run();
  await app.stop();

  return app;
}

/**
 * Print why startup failed and return the process exit code.
 */
export function reportStartupFailure(
  err: unknown,
  log: (...args: unknown[]) => void = console.error,
): number {
  if (err instanceof ConfigError) {
    log(`Fatal error: ${err.message}`);
  } else {
    log('Cannot start the application.', err);
  }
  return 1;
}

if (require.main === module) {
  main().catch(err => {
    process.exit(reportStartupFailure(err));
  });
}
