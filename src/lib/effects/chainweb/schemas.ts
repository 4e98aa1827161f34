/**
 * Chainweb Pact API Schemas
 * Effect schemas for /local, /send and /poll responses and Pact numeric literals
 */

import { Schema } from 'effect';

// ============= Pact literals =============
// Pact encodes integers as {"int": n} and decimals as {"decimal": "n"}; small values may be plain numbers
export const PactIntSchema = Schema.Union(Schema.Number, Schema.Struct({ int: Schema.Union(Schema.Number, Schema.String) }));

export const PactDecimalSchema = Schema.Union(
  Schema.Number,
  Schema.String,
  Schema.Struct({ decimal: Schema.Union(Schema.Number, Schema.String) }),
);

export const PactNumberSchema = Schema.Union(PactIntSchema, PactDecimalSchema);

export type PactInt = Schema.Schema.Type<typeof PactIntSchema>;
export type PactNumber = Schema.Schema.Type<typeof PactNumberSchema>;

// ============= Command results =============
export const PactErrorSchema = Schema.Struct({
  message: Schema.String,
  type: Schema.optional(Schema.String),
});

export const PactResultSchema = Schema.Union(
  Schema.Struct({
    status: Schema.Literal('success'),
    data: Schema.Unknown,
  }),
  Schema.Struct({
    status: Schema.Literal('failure'),
    error: PactErrorSchema,
  }),
);

export const CommandResultSchema = Schema.Struct({
  reqKey: Schema.String,
  result: PactResultSchema,
  txId: Schema.optional(Schema.NullOr(Schema.Number)),
  gas: Schema.optional(Schema.Number),
});

export const SendResponseSchema = Schema.Struct({
  requestKeys: Schema.NonEmptyArray(Schema.String),
});

export const PollResponseSchema = Schema.Record({ key: Schema.String, value: CommandResultSchema });

// ============= TellorFlex =============
export const StakerInfoResponseSchema = Schema.Struct({
  'start-date': PactIntSchema,
  'staked-balance': PactIntSchema,
  'locked-balance': PactIntSchema,
  'reward-debt': PactIntSchema,
  'reporter-last-timestamp': PactIntSchema,
  'reports-submitted': PactIntSchema,
  'start-vote-count': PactIntSchema,
  'start-vote-tally': PactIntSchema,
  'is-staked': Schema.Boolean,
});

export type PactResult = Schema.Schema.Type<typeof PactResultSchema>;
export type CommandResult = Schema.Schema.Type<typeof CommandResultSchema>;
export type SendResponse = Schema.Schema.Type<typeof SendResponseSchema>;
export type PollResponse = Schema.Schema.Type<typeof PollResponseSchema>;
export type StakerInfoResponse = Schema.Schema.Type<typeof StakerInfoResponseSchema>;

// ============= Conversions =============
/** Integer value of a Pact literal; decimals are truncated */
export function pactToBigInt(value: PactNumber): bigint {
  if (typeof value === 'number') {
    return BigInt(Math.trunc(value));
  }
  if (typeof value === 'string') {
    return decimalStringToBigInt(value);
  }
  const raw = 'int' in value ? value.int : value.decimal;
  return typeof raw === 'number' ? BigInt(Math.trunc(raw)) : decimalStringToBigInt(raw);
}

export function pactToNumber(value: PactNumber): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') return Number(value);
  return Number('int' in value ? value.int : value.decimal);
}

const decimalStringToBigInt = (value: string): bigint => {
  const trimmed = value.trim();
  const match = /^(-?\d+)(\.\d*)?$/.exec(trimmed);
  if (match?.[1] !== undefined) {
    return BigInt(match[1]);
  }
  // exponent notation such as "1.6e+19"; throws RangeError when not a number
  return BigInt(Math.trunc(Number(trimmed)));
};
