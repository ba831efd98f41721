/**
 * River Bot Errors
 *
 * Every fatal condition of a run is a RiverBotError with a stable code.
 * Unknown stations are not errors here; see StationResult in ./types.
 */

export type RiverBotErrorCode =
  | 'config'
  | 'upstream_fetch'
  | 'render'
  | 'empty_series'
  | 'publish';

export class RiverBotError extends Error {
  readonly code: RiverBotErrorCode;

  constructor(code: RiverBotErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RiverBotError';
    this.code = code;
  }
}

export class ConfigError extends RiverBotError {
  constructor(message: string) {
    super('config', message);
    this.name = 'ConfigError';
  }
}

export class UpstreamFetchError extends RiverBotError {
  readonly status: number | null;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super('upstream_fetch', message, { cause: options.cause });
    this.name = 'UpstreamFetchError';
    this.status = options.status ?? null;
  }
}

export class RenderError extends RiverBotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('render', message, options);
    this.name = 'RenderError';
  }
}

export class EmptySeriesError extends RenderError {
  override readonly code = 'empty_series';
  readonly stationId: string;

  constructor(stationId: string) {
    super(`No readings to chart for station ${stationId}`);
    this.name = 'EmptySeriesError';
    this.stationId = stationId;
  }
}

export class PublishError extends RiverBotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('publish', message, options);
    this.name = 'PublishError';
  }
}
