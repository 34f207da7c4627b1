import {FakeWeatherProvider, SAMPLE_WEATHER} from '../__tests__/fake-weather-provider';
import {
  CapacityError,
  DuplicateError,
  IndexError,
  NotFoundError,
  TransportError,
} from '../errors';
import {City} from '../models';
import {FavouritesService, MAX_FAVOURITES} from './favourites.service';

describe('FavouritesService', () => {
  let provider: FakeWeatherProvider;
  let list: City[];
  let service: FavouritesService;

  const names = () => service.entries().map(city => city.name);

  beforeEach(() => {
    provider = new FakeWeatherProvider();
    list = [];
    service = new FavouritesService(provider, list);
  });

  async function seed(...cities: string[]) {
    for (const city of cities) await service.add(city);
    provider.calls.length = 0;
  }

  describe('add', () => {
    it('stores the city under the name the provider resolved', async () => {
      const city = await service.add('  london ');

      expect(city).toEqual({name: 'London', country: 'GB'});
      expect(service.entries()).toEqual([{name: 'London', country: 'GB'}]);
      expect(provider.calls).toEqual(['london']);
    });

    it('writes into the list it was given', async () => {
      await service.add('Paris');
      expect(list).toEqual([{name: 'Paris', country: 'FR'}]);
    });

    it('fails the fourth addition with CapacityError', async () => {
      await service.add('London');
      await service.add('Paris');
      await service.add('Tokyo');

      await expect(service.add('Berlin')).rejects.toBeInstanceOf(CapacityError);
      expect(names()).toEqual(['London', 'Paris', 'Tokyo']);
      expect(provider.calls).toEqual(['London', 'Paris', 'Tokyo']);
    });

    it('never holds more than the capacity', async () => {
      const attempts = ['London', 'Atlantis', 'Paris', 'london', 'Tokyo', 'Berlin', 'NYC'];
      for (const name of attempts) {
        await service.add(name).catch(() => undefined);
        expect(service.size).toBeLessThanOrEqual(MAX_FAVOURITES);
      }
      expect(names()).toEqual(['London', 'Paris', 'Tokyo']);
    });

    it('rejects the same normalized name without asking the provider', async () => {
      await seed('London');

      await expect(service.add(' LONDON ')).rejects.toThrow(
        new DuplicateError('LONDON'),
      );
      expect(provider.calls).toEqual([]);
      expect(service.size).toBe(1);
    });

    it('compares names case-folded', async () => {
      list.push({name: 'Straße', country: 'DE'});

      await expect(service.add('STRASSE')).rejects.toThrow(
        new DuplicateError('STRASSE'),
      );
      expect(provider.calls).toEqual([]);
    });

    it('rejects a different name that resolves to an existing city', async () => {
      await seed('New York');

      await expect(service.add('NYC')).rejects.toThrow(
        "'New York' is already in your favourites.",
      );
      expect(provider.calls).toEqual(['NYC']);
      expect(service.size).toBe(1);
    });

    it('propagates NotFoundError and leaves the list empty', async () => {
      await expect(service.add('Atlantis')).rejects.toThrow(
        new NotFoundError('Atlantis'),
      );
      expect(service.size).toBe(0);
    });

    it('propagates TransportError from the provider', async () => {
      const failure = new TransportError('OpenWeather API returned status 401: nope', 401);
      provider.failures.set('paris', failure);

      await expect(service.add('Paris')).rejects.toBe(failure);
      expect(service.size).toBe(0);
    });
  });

  describe('list', () => {
    it('returns nothing for an empty list', async () => {
      await expect(service.list()).resolves.toEqual([]);
      expect(provider.calls).toEqual([]);
    });

    it('fetches fresh weather for each favourite in order', async () => {
      await seed('London', 'Paris');

      const results = await service.list();

      expect(provider.calls).toEqual(['London', 'Paris']);
      expect(results).toEqual([
        {city: {name: 'London', country: 'GB'}, ok: true, weather: SAMPLE_WEATHER},
        {city: {name: 'Paris', country: 'FR'}, ok: true, weather: SAMPLE_WEATHER},
      ]);
    });

    it('reports a failed lookup on its own entry and carries on', async () => {
      await seed('London', 'Paris', 'Tokyo');
      const failure = new TransportError('Network error while contacting OpenWeather: timeout');
      provider.failures.set('paris', failure);

      const results = await service.list();

      expect(results).toHaveLength(3);
      expect(results[0]).toEqual({
        city: {name: 'London', country: 'GB'},
        ok: true,
        weather: SAMPLE_WEATHER,
      });
      expect(results[1]).toEqual({
        city: {name: 'Paris', country: 'FR'},
        ok: false,
        error: failure,
      });
      expect(results[2].ok).toBe(true);
      expect(provider.calls).toEqual(['London', 'Paris', 'Tokyo']);
    });

    it('rethrows errors that are not weather errors', async () => {
      await seed('London');
      jest.spyOn(provider, 'getWeather').mockRejectedValueOnce(new RangeError('bug'));

      await expect(service.list()).rejects.toThrow(RangeError);
    });
  });

  describe('remove', () => {
    it('removes and returns the city at the index', async () => {
      await seed('London', 'Paris', 'Tokyo');

      expect(service.remove(1)).toEqual({name: 'Paris', country: 'FR'});
      expect(names()).toEqual(['London', 'Tokyo']);

      const listed = await service.list();
      expect(listed.map(entry => entry.city.name)).toEqual(['London', 'Tokyo']);
    });

    it('frees a slot for another addition', async () => {
      await seed('London', 'Paris', 'Tokyo');
      service.remove(0);

      await service.add('Berlin');
      expect(names()).toEqual(['Paris', 'Tokyo', 'Berlin']);
    });

    it.each([-1, 2, 1.5, Number.NaN])('rejects index %p with IndexError', async index => {
      await seed('London', 'Paris');

      expect(() => service.remove(index)).toThrow(IndexError);
      expect(names()).toEqual(['London', 'Paris']);
    });

    it('rejects any index on an empty list', () => {
      expect(() => service.remove(0)).toThrow(
        'There are no favourite cities to select.',
      );
    });
  });

  describe('update', () => {
    it('replaces the entry in place', async () => {
      await seed('London', 'Paris', 'Tokyo');

      const result = await service.update(1, 'Berlin');

      expect(result).toEqual({
        removed: {name: 'Paris', country: 'FR'},
        added: {name: 'Berlin', country: 'DE'},
      });
      expect(names()).toEqual(['London', 'Berlin', 'Tokyo']);
    });

    it('leaves the list unchanged when the new city is not found', async () => {
      await seed('London', 'Paris', 'Tokyo');
      const before = service.entries();

      await expect(service.update(1, 'Atlantis')).rejects.toBeInstanceOf(NotFoundError);
      expect(service.entries()).toEqual(before);
    });

    it('leaves the list unchanged when the provider is unreachable', async () => {
      await seed('London', 'Paris');
      provider.failures.set('berlin', new TransportError('down'));
      const before = service.entries();

      await expect(service.update(0, 'Berlin')).rejects.toBeInstanceOf(TransportError);
      expect(service.entries()).toEqual(before);
    });

    it('rejects a city already held in another slot', async () => {
      await seed('London', 'Paris', 'Tokyo');

      await expect(service.update(0, 'tokyo')).rejects.toBeInstanceOf(DuplicateError);
      expect(names()).toEqual(['London', 'Paris', 'Tokyo']);
      expect(provider.calls).toEqual([]);
    });

    it('rejects a name that resolves to a city in another slot', async () => {
      await seed('London', 'New York');

      await expect(service.update(0, 'NYC')).rejects.toThrow(
        new DuplicateError('New York'),
      );
      expect(provider.calls).toEqual(['NYC']);
      expect(names()).toEqual(['London', 'New York']);
    });

    it('allows replacing a city with itself', async () => {
      await seed('London', 'Paris');

      const {removed, added} = await service.update(0, 'london');

      expect(removed).toEqual(added);
      expect(names()).toEqual(['London', 'Paris']);
    });

    it('checks the index before contacting the provider', async () => {
      await seed('London');

      await expect(service.update(3, 'Berlin')).rejects.toBeInstanceOf(IndexError);
      expect(provider.calls).toEqual([]);
    });
  });

  it('walks through add, capacity, update and list', async () => {
    await service.add('London');
    await service.add('Paris');
    await service.add('Tokyo');
    await expect(service.add('Berlin')).rejects.toBeInstanceOf(CapacityError);

    await service.update(1, 'Berlin');
    expect(service.isFull()).toBe(true);

    const listed = await service.list();
    expect(listed.map(entry => entry.city.name)).toEqual(['London', 'Berlin', 'Tokyo']);
  });
});
