/**
 * SpotPrice query catalog
 * Known asset/currency pairs with the symbol each price source uses for them
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Effect, pipe, Schema } from 'effect';
import { FileError, ParseError } from '../effects/errors.js';

export const SourceSymbolsSchema = Schema.Struct({
  coingecko: Schema.optional(Schema.String),
  coinbase: Schema.optional(Schema.String),
  kraken: Schema.optional(Schema.String),
});

export const CatalogEntrySchema = Schema.Struct({
  tag: Schema.String,
  asset: Schema.String,
  currency: Schema.String,
  sources: SourceSymbolsSchema,
});

const CatalogFileSchema = Schema.Struct({
  queries: Schema.Array(CatalogEntrySchema),
});

export type SourceSymbols = Schema.Schema.Type<typeof SourceSymbolsSchema>;
export type CatalogEntry = Schema.Schema.Type<typeof CatalogEntrySchema>;

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../../../data/query-catalog.json', import.meta.url));

export class QueryCatalog {
  constructor(readonly entries: readonly CatalogEntry[]) {}

  find(tag: string): CatalogEntry | undefined {
    const normalized = tag.trim().toLowerCase();
    return this.entries.find((entry) => entry.tag === normalized);
  }

  /** First entry for a pair, matched case-insensitively */
  findPair(asset: string, currency: string): CatalogEntry | undefined {
    const a = asset.toLowerCase();
    const c = currency.toLowerCase();
    return this.entries.find((entry) => entry.asset === a && entry.currency === c);
  }

  /** CoinGecko coin id for an asset, from any entry that knows it */
  coingeckoId(asset: string): string | undefined {
    const a = asset.toLowerCase();
    return this.entries.find((entry) => entry.asset === a && entry.sources.coingecko)?.sources.coingecko;
  }

  tags(): string[] {
    return this.entries.map((entry) => entry.tag);
  }

  random(rng: () => number = Math.random): CatalogEntry | undefined {
    if (this.entries.length === 0) return undefined;
    return this.entries[Math.floor(rng() * this.entries.length) % this.entries.length];
  }
}

export function loadQueryCatalog(path: string = DEFAULT_CATALOG_PATH): Effect.Effect<QueryCatalog, FileError | ParseError> {
  return pipe(
    Effect.try({
      try: (): unknown => JSON.parse(readFileSync(path, 'utf-8')),
      catch: (error) => new FileError(`Failed to load query catalog: ${error}`, path, error),
    }),
    Effect.flatMap((raw) =>
      Schema.decodeUnknown(CatalogFileSchema)(raw).pipe(
        Effect.mapError((error) => new ParseError(`Invalid query catalog: ${error.message}`, 'queries', raw, error)),
      ),
    ),
    Effect.map((file) => new QueryCatalog(file.queries)),
  );
}
