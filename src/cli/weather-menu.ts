/**
 * WeatherMenu: numbered text menu over an input/output stream pair.
 *
 * Every WeatherCliError raised by an action is printed and the loop carries
 * on. End of input behaves like choosing Exit.
 */
import {BindingScope, inject, injectable} from '@loopback/core';
import {createInterface} from 'readline';
import {Readable, Writable} from 'stream';
import {WeatherCliError} from '../errors';
import {WeatherCliBindings} from '../keys';
import type {WeatherProvider} from '../models';
import type {FavouritesService} from '../services/favourites.service';
import {formatLocation, formatWeather} from './format';

export interface MenuIO {
  input: Readable;
  output: Writable;
}

type Action = 'search' | 'add' | 'list' | 'update' | 'remove' | 'exit';

const MENU: ReadonlyArray<[string, Action]> = [
  ['Search weather for a city', 'search'],
  ['Add a city to favourites', 'add'],
  ['List favourite cities and their weather', 'list'],
  ['Update favourite cities (replace one)', 'update'],
  ['Remove a city from favourites', 'remove'],
  ['Exit', 'exit'],
];

@injectable({scope: BindingScope.TRANSIENT})
export class WeatherMenu {
  private lines?: AsyncIterator<string>;

  constructor(
    @inject(WeatherCliBindings.WEATHER_PROVIDER)
    private weather: WeatherProvider,
    @inject(WeatherCliBindings.FAVOURITES_SERVICE)
    private favourites: FavouritesService,
    @inject(WeatherCliBindings.MENU_IO)
    private io: MenuIO,
  ) {}

  async run(): Promise<void> {
    const rl = createInterface({input: this.io.input, terminal: false});
    this.lines = rl[Symbol.asyncIterator]();

    this.print('Welcome to the OpenWeather CLI app!\n');
    try {
      for (;;) {
        this.printMenu();
        const choice = await this.prompt(`Choose an option (1-${MENU.length}): `);
        if (choice === undefined) {
          this.print('\nGoodbye!');
          return;
        }
        this.print('');

        const action = MENU[Number(choice) - 1]?.[1];
        if (!/^\d+$/.test(choice) || !action) {
          this.print(`Invalid choice. Please select 1-${MENU.length}.\n`);
          continue;
        }
        if (action === 'exit') {
          this.print('Goodbye!');
          return;
        }
        await this.dispatch(action);
      }
    } finally {
      rl.close();
    }
  }

  private async dispatch(action: Exclude<Action, 'exit'>): Promise<void> {
    try {
      switch (action) {
        case 'search':
          return await this.search();
        case 'add':
          return await this.add();
        case 'list':
          return await this.list();
        case 'update':
          return await this.update();
        case 'remove':
          return await this.remove();
      }
    } catch (err) {
      if (err instanceof WeatherCliError) {
        this.print(`Error: ${err.message}\n`);
        return;
      }
      console.error('[WeatherMenu] Unexpected error:', err);
      this.print('Something went wrong. See the log for details.\n');
    }
  }

  private async search(): Promise<void> {
    const city = await this.promptCity();
    if (!city) {
      this.print('Search cancelled.\n');
      return;
    }
    const report = await this.weather.getWeather(city);
    this.print(`${formatWeather(report)}\n`);
  }

  private async add(): Promise<void> {
    if (this.favourites.isFull()) {
      this.print(
        `You already have ${this.favourites.capacity} favourite cities. ` +
          "Use 'Update favourite cities' to change them.\n",
      );
      return;
    }
    const name = await this.promptCity();
    if (!name) {
      this.print('Add favourite cancelled.\n');
      return;
    }
    const city = await this.favourites.add(name);
    this.print(`Added '${city.name}' to favourites.\n`);
  }

  private async list(): Promise<void> {
    if (this.favourites.size === 0) {
      this.print('You have no favourite cities yet.\n');
      return;
    }
    this.print('Favourite cities and their current weather:');
    this.print('-------------------------------------------');
    const results = await this.favourites.list();
    results.forEach((entry, i) => {
      this.print(`\n[${i + 1}] ${formatLocation(entry.city)}`);
      if (entry.ok) {
        this.print(formatWeather({city: entry.city, weather: entry.weather}));
      } else {
        this.print(
          `  Error fetching weather for '${entry.city.name}': ${entry.error.message}`,
        );
      }
    });
    this.print('');
  }

  private async update(): Promise<void> {
    if (this.favourites.size === 0) {
      this.print(
        "You have no favourite cities to update. Use 'Add a city to favourites' first.\n",
      );
      return;
    }
    const index = await this.promptIndex('Enter the number of the city to replace: ');
    if (index === undefined) return;

    const name = await this.promptCity();
    if (!name) {
      this.print('Update cancelled. No changes made.\n');
      return;
    }
    const {removed, added} = await this.favourites.update(index, name);
    this.print(`Replaced '${removed.name}' with '${added.name}'.\n`);
  }

  private async remove(): Promise<void> {
    if (this.favourites.size === 0) {
      this.print('You have no favourite cities to remove.\n');
      return;
    }
    const index = await this.promptIndex('Enter the number of the city to remove: ');
    if (index === undefined) return;

    const removed = this.favourites.remove(index);
    this.print(`Removed '${removed.name}' from favourites.\n`);
  }

  /**
   * Show the current favourites and read a 1-based choice, returned 0-based.
   * Range checking is left to FavouritesService.
   */
  private async promptIndex(question: string): Promise<number | undefined> {
    this.print('Current favourites:');
    this.favourites.entries().forEach((city, i) => {
      this.print(`  ${i + 1}. ${formatLocation(city)}`);
    });
    const answer = (await this.prompt(question)) ?? '';
    if (!/^\d+$/.test(answer)) {
      this.print('Invalid input. Please enter a number.\n');
      return undefined;
    }
    return Number(answer) - 1;
  }

  private async promptCity(): Promise<string> {
    const answer = await this.prompt('Enter city name (or press Enter to cancel): ');
    return answer ?? '';
  }

  /** Resolves with the trimmed line, or undefined once input has ended. */
  private async prompt(question: string): Promise<string | undefined> {
    this.io.output.write(question);
    if (!this.lines) return undefined;
    const next = await this.lines.next();
    return next.done ? undefined : next.value.trim();
  }

  private printMenu(): void {
    this.print('Weather CLI');
    this.print('-----------');
    MENU.forEach(([label], i) => this.print(`${i + 1}. ${label}`));
  }

  private print(line: string): void {
    this.io.output.write(`${line}\n`);
  }
}
