/**
 * HTTP price sources
 * Each source fetches one spot price for a single pair and fails with PriceSourceError
 */

import { Effect, pipe, Schema } from 'effect';
import { PriceSourceError } from '../effects/errors.js';
import type { HttpClientService } from '../effects/layers.js';

export interface PriceSource {
  readonly name: string;
  fetchPrice(): Effect.Effect<number, PriceSourceError>;
}

export const COINGECKO_API = 'https://api.coingecko.com/api/v3';
export const COINBASE_API = 'https://api.coinbase.com/v2';
export const KRAKEN_API = 'https://api.kraken.com/0/public';

const headers = { Accept: 'application/json' };

const validatePrice = (source: string, price: number): Effect.Effect<number, PriceSourceError> =>
  Number.isFinite(price) && price > 0
    ? Effect.succeed(price)
    : Effect.fail(new PriceSourceError(`Invalid price from ${source}: ${price}`, source));

function getJson<A, I>(
  http: HttpClientService,
  source: string,
  url: string,
  schema: Schema.Schema<A, I>,
): Effect.Effect<A, PriceSourceError> {
  return pipe(
    http.get(url, headers),
    Effect.mapError((error) => new PriceSourceError(`${source} request failed: ${error.message}`, source, error)),
    Effect.flatMap((data) =>
      Schema.decodeUnknown(schema)(data).pipe(
        Effect.mapError((error) => new PriceSourceError(`Unexpected ${source} response: ${error.message}`, source, error)),
      ),
    ),
  );
}

// ============= CoinGecko =============
const CoinGeckoResponseSchema = Schema.Record({
  key: Schema.String,
  value: Schema.Record({ key: Schema.String, value: Schema.Number }),
});

export class CoinGeckoSource implements PriceSource {
  readonly name = 'coingecko';

  constructor(
    private readonly http: HttpClientService,
    readonly coinId: string,
    readonly currency: string,
  ) {}

  fetchPrice(): Effect.Effect<number, PriceSourceError> {
    const vs = this.currency.toLowerCase();
    const url = `${COINGECKO_API}/simple/price?ids=${encodeURIComponent(this.coinId)}&vs_currencies=${encodeURIComponent(vs)}`;
    return pipe(
      getJson(this.http, this.name, url, CoinGeckoResponseSchema),
      Effect.flatMap((data) => {
        const price = data[this.coinId]?.[vs];
        return price === undefined
          ? Effect.fail(new PriceSourceError(`No ${this.coinId}/${vs} price from coingecko`, this.name))
          : validatePrice(this.name, price);
      }),
    );
  }
}

// ============= Coinbase =============
const CoinbaseResponseSchema = Schema.Struct({
  data: Schema.Struct({
    amount: Schema.String,
    currency: Schema.optional(Schema.String),
  }),
});

export class CoinbaseSource implements PriceSource {
  readonly name = 'coinbase';

  constructor(
    private readonly http: HttpClientService,
    readonly pair: string,
  ) {}

  fetchPrice(): Effect.Effect<number, PriceSourceError> {
    const url = `${COINBASE_API}/prices/${encodeURIComponent(this.pair)}/spot`;
    return pipe(
      getJson(this.http, this.name, url, CoinbaseResponseSchema),
      Effect.flatMap((response) => validatePrice(this.name, Number(response.data.amount))),
    );
  }
}

// ============= Kraken =============
const KrakenResponseSchema = Schema.Struct({
  error: Schema.Array(Schema.String),
  result: Schema.optional(
    Schema.Record({
      key: Schema.String,
      // c = last trade closed [price, lot volume]
      value: Schema.Struct({ c: Schema.Array(Schema.String) }),
    }),
  ),
});

export class KrakenSource implements PriceSource {
  readonly name = 'kraken';

  constructor(
    private readonly http: HttpClientService,
    readonly pair: string,
  ) {}

  fetchPrice(): Effect.Effect<number, PriceSourceError> {
    const url = `${KRAKEN_API}/Ticker?pair=${encodeURIComponent(this.pair)}`;
    return pipe(
      getJson(this.http, this.name, url, KrakenResponseSchema),
      Effect.flatMap((response) => {
        if (response.error.length > 0) {
          return Effect.fail(new PriceSourceError(`kraken error: ${response.error.join(', ')}`, this.name));
        }
        // Kraken renames pairs in the result (XBTUSD -> XXBTZUSD), so take the only entry
        const [ticker] = Object.values(response.result ?? {});
        const last = ticker?.c[0];
        return last === undefined
          ? Effect.fail(new PriceSourceError(`No ${this.pair} ticker from kraken`, this.name))
          : validatePrice(this.name, Number(last));
      }),
    );
  }
}
