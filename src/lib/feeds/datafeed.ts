/**
 * SpotPrice data feeds
 * A feed pairs a SpotPrice query with the sources that price it; a fresh
 * datapoint is the median of every source that answered.
 */

import { Effect, Option, pipe } from 'effect';
import { PriceSourceError } from '../effects/errors.js';
import type { HttpClientService, LoggerService } from '../effects/layers.js';
import type { CatalogEntry, QueryCatalog, SourceSymbols } from './catalog.js';
import { CoinbaseSource, CoinGeckoSource, KrakenSource, type PriceSource } from './sources.js';

export interface SpotPriceQuery {
  readonly type: 'SpotPrice';
  readonly asset: string;
  readonly currency: string;
}

export interface Datapoint {
  value: number;
  timestamp: Date;
  sources: string[];
}

export const spotPrice = (asset: string, currency: string): SpotPriceQuery => ({
  type: 'SpotPrice',
  asset: asset.toLowerCase(),
  currency: currency.toLowerCase(),
});

/** JSON descriptor identifying the query, e.g. {"type":"SpotPrice","asset":"eth","currency":"usd"} */
export const queryDescriptor = (query: SpotPriceQuery): string =>
  JSON.stringify({ type: query.type, asset: query.asset, currency: query.currency });

export function median(values: readonly number[]): number {
  if (values.length === 0) {
    throw new RangeError('median of an empty list');
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

export class DataFeed {
  private latestDatapoint: Datapoint | null = null;

  constructor(
    readonly query: SpotPriceQuery,
    readonly sources: readonly PriceSource[],
    private readonly logger: LoggerService,
  ) {}

  get descriptor(): string {
    return queryDescriptor(this.query);
  }

  get latest(): Datapoint | null {
    return this.latestDatapoint;
  }

  /**
   * Query every source concurrently and store the median of the successful ones
   */
  fetchNewDatapoint(): Effect.Effect<Datapoint, PriceSourceError> {
    const self = this;
    return Effect.gen(function* () {
      const results = yield* Effect.forEach(
        self.sources,
        (source) =>
          pipe(
            source.fetchPrice(),
            Effect.map((price) => ({ source: source.name, price })),
            Effect.tapError((error) => self.logger.warn(`Price source ${source.name} failed`, { error: error.message })),
            Effect.option,
          ),
        { concurrency: 'unbounded' },
      );

      const prices = results.flatMap((result) => (Option.isSome(result) ? [result.value] : []));
      if (prices.length === 0) {
        return yield* Effect.fail(
          new PriceSourceError(`No price sources available for ${self.query.asset}/${self.query.currency}`),
        );
      }

      const datapoint: Datapoint = {
        value: median(prices.map(({ price }) => price)),
        timestamp: new Date(),
        sources: prices.map(({ source }) => source),
      };
      self.latestDatapoint = datapoint;
      yield* self.logger.debug('Fetched datapoint', {
        descriptor: self.descriptor,
        value: datapoint.value,
        sources: datapoint.sources,
      });
      return datapoint;
    });
  }
}

function sourcesFor(http: HttpClientService, currency: string, symbols: SourceSymbols): PriceSource[] {
  const sources: PriceSource[] = [];
  if (symbols.coingecko) sources.push(new CoinGeckoSource(http, symbols.coingecko, currency));
  if (symbols.coinbase) sources.push(new CoinbaseSource(http, symbols.coinbase));
  if (symbols.kraken) sources.push(new KrakenSource(http, symbols.kraken));
  return sources;
}

export const feedFromEntry = (entry: CatalogEntry, http: HttpClientService, logger: LoggerService): DataFeed =>
  new DataFeed(spotPrice(entry.asset, entry.currency), sourcesFor(http, entry.currency, entry.sources), logger);

/**
 * Feed for any asset/currency pair. Catalog pairs keep their curated symbols;
 * other pairs use the exchange tickers derived from the symbols.
 */
export function buildSpotFeed(
  asset: string,
  currency: string,
  catalog: QueryCatalog,
  http: HttpClientService,
  logger: LoggerService,
): DataFeed {
  const known = catalog.findPair(asset, currency);
  if (known) {
    return feedFromEntry(known, http, logger);
  }
  const base = asset.toUpperCase();
  const quote = currency.toUpperCase();
  const symbols: SourceSymbols = {
    coingecko: catalog.coingeckoId(asset),
    coinbase: `${base}-${quote}`,
    kraken: `${base}${quote}`,
  };
  return new DataFeed(spotPrice(asset, currency), sourcesFor(http, currency, symbols), logger);
}

export function suggestRandomFeed(
  catalog: QueryCatalog,
  http: HttpClientService,
  logger: LoggerService,
  rng: () => number = Math.random,
): DataFeed | undefined {
  const entry = catalog.random(rng);
  return entry ? feedFromEntry(entry, http, logger) : undefined;
}
