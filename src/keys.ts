import {BindingKey} from '@loopback/core';
import type {WeatherMenu, MenuIO} from './cli/weather-menu';
import type {OpenWeatherConfig} from './config';
import type {City, WeatherProvider} from './models';
import type {FavouritesService} from './services/favourites.service';

export namespace WeatherCliBindings {
  export const CONFIG = BindingKey.create<OpenWeatherConfig>(
    'config.openWeather',
  );
  export const WEATHER_PROVIDER = BindingKey.create<WeatherProvider>(
    'services.WeatherService',
  );
  /** The process-lifetime favourites list, owned by the application. */
  export const FAVOURITES = BindingKey.create<City[]>('state.favourites');
  export const FAVOURITES_SERVICE = BindingKey.create<FavouritesService>(
    'services.FavouritesService',
  );
  export const MENU_IO = BindingKey.create<MenuIO>('cli.io');
  export const MENU = BindingKey.create<WeatherMenu>('cli.WeatherMenu');
}
