/**
 * FavouritesService: bounded, ordered list of favourite cities.
 *
 * Additions are validated against the weather provider and stored under the
 * provider's canonical name. Identity is the normalized (trimmed,
 * case-folded) name.
 */
import {BindingScope, inject, injectable} from '@loopback/core';
import {
  CapacityError,
  DuplicateError,
  IndexError,
  WeatherCliError,
} from '../errors';
import {WeatherCliBindings} from '../keys';
import {
  City,
  FavouriteWeather,
  normalizeCityName,
  WeatherProvider,
} from '../models';

export const MAX_FAVOURITES = 3;

@injectable({scope: BindingScope.SINGLETON})
export class FavouritesService {
  constructor(
    @inject(WeatherCliBindings.WEATHER_PROVIDER)
    private provider: WeatherProvider,
    @inject(WeatherCliBindings.FAVOURITES)
    private favourites: City[],
  ) {}

  get size(): number {
    return this.favourites.length;
  }

  get capacity(): number {
    return MAX_FAVOURITES;
  }

  isFull(): boolean {
    return this.favourites.length >= MAX_FAVOURITES;
  }

  entries(): readonly City[] {
    return this.favourites.map(city => ({...city}));
  }

  async add(cityName: string): Promise<City> {
    if (this.isFull()) {
      throw new CapacityError(MAX_FAVOURITES);
    }
    const city = await this.resolve(cityName, -1);
    this.favourites.push(city);
    return city;
  }

  /**
   * Fetch fresh weather for every favourite, in order. A failed lookup is
   * reported on its own entry and does not stop the rest.
   */
  async list(): Promise<FavouriteWeather[]> {
    const results: FavouriteWeather[] = [];
    for (const city of this.entries()) {
      try {
        const report = await this.provider.getWeather(city.name);
        results.push({city, ok: true, weather: report.weather});
      } catch (err) {
        if (!(err instanceof WeatherCliError)) throw err;
        results.push({city, ok: false, error: err});
      }
    }
    return results;
  }

  remove(index: number): City {
    this.checkIndex(index);
    const [removed] = this.favourites.splice(index, 1);
    return removed;
  }

  /**
   * Replace the favourite at `index` with a new city, keeping its slot.
   * Nothing is written until the new city has been resolved and checked, so
   * a failure leaves the list untouched.
   */
  async update(
    index: number,
    newCityName: string,
  ): Promise<{removed: City; added: City}> {
    this.checkIndex(index);
    const added = await this.resolve(newCityName, index);
    const [removed] = this.favourites.splice(index, 1, added);
    return {removed, added};
  }

  /**
   * Validate a new name through the provider and check it against every
   * entry except `skipIndex`.
   */
  private async resolve(cityName: string, skipIndex: number): Promise<City> {
    const requested = cityName.trim();
    if (this.indexOfName(requested, skipIndex) >= 0) {
      throw new DuplicateError(requested);
    }

    const {city} = await this.provider.getWeather(requested);

    if (this.indexOfName(city.name, skipIndex) >= 0) {
      throw new DuplicateError(city.name);
    }
    return {...city};
  }

  private indexOfName(name: string, skipIndex: number): number {
    const key = normalizeCityName(name);
    return this.favourites.findIndex(
      (city, i) => i !== skipIndex && normalizeCityName(city.name) === key,
    );
  }

  private checkIndex(index: number): void {
    if (
      !Number.isInteger(index) ||
      index < 0 ||
      index >= this.favourites.length
    ) {
      throw new IndexError(index, this.favourites.length);
    }
  }
}
