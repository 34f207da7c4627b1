import 'reflect-metadata';
import {Application, ApplicationConfig, BindingScope} from '@loopback/core';
import {MenuIO, WeatherMenu} from './cli/weather-menu';
import {loadOpenWeatherConfig, OpenWeatherConfig} from './config';
import {WeatherCliBindings} from './keys';
import {City} from './models';
import {FavouritesService} from './services/favourites.service';
import {WeatherService} from './services/weather.service';

export {ApplicationConfig};

export interface WeatherCliApplicationConfig extends ApplicationConfig {
  /** Skips reading OPENWEATHER_* from the environment when given. */
  openWeather?: OpenWeatherConfig;
  io?: MenuIO;
}

export class WeatherCliApplication extends Application {
  constructor(options: WeatherCliApplicationConfig = {}) {
    super(options);

    // Throws ConfigError before anything is shown to the user
    this.bind(WeatherCliBindings.CONFIG).to(
      options.openWeather ?? loadOpenWeatherConfig(process.env),
    );

    // ── Services ──────────────────────────────────────────────
    this.bind(WeatherCliBindings.WEATHER_PROVIDER)
      .toClass(WeatherService)
      .inScope(BindingScope.SINGLETON);
    this.bind(WeatherCliBindings.FAVOURITES_SERVICE)
      .toClass(FavouritesService)
      .inScope(BindingScope.SINGLETON);

    // ── Process-lifetime state: starts empty, dropped at exit ─
    const favourites: City[] = [];
    this.bind(WeatherCliBindings.FAVOURITES).to(favourites);

    // ── Terminal ──────────────────────────────────────────────
    this.bind(WeatherCliBindings.MENU_IO).to(
      options.io ?? {input: process.stdin, output: process.stdout},
    );
    this.bind(WeatherCliBindings.MENU).toClass(WeatherMenu);
  }
}
