/**
 * Error types surfaced by the weather client and the favourites list.
 *
 * Everything except ConfigError is recoverable: the menu prints the message
 * and returns to the prompt.
 */
export class WeatherCliError extends Error {
  constructor(message: string, options?: {cause?: unknown}) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The provider could not resolve the city. */
export class NotFoundError extends WeatherCliError {
  constructor(readonly city: string) {
    super(`City '${city}' not found.`);
  }
}

/** Network, auth, timeout or malformed-response failure talking to the provider. */
export class TransportError extends WeatherCliError {
  constructor(
    message: string,
    readonly statusCode?: number,
    options?: {cause?: unknown},
  ) {
    super(message, options);
  }
}

export class CapacityError extends WeatherCliError {
  constructor(readonly capacity: number) {
    super(
      `You already have ${capacity} favourite cities. ` +
        'Use update to replace one or remove one first.',
    );
  }
}

export class DuplicateError extends WeatherCliError {
  constructor(readonly city: string) {
    super(`'${city}' is already in your favourites.`);
  }
}

export class IndexError extends WeatherCliError {
  constructor(
    readonly index: number,
    readonly size: number,
  ) {
    super(
      size === 0
        ? 'There are no favourite cities to select.'
        : `Choice out of range. Pick a number between 1 and ${size}.`,
    );
  }
}

export class ValidationError extends WeatherCliError {}

export class ConfigError extends WeatherCliError {}
