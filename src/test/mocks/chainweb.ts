/**
 * In-process stand-in for a Chainweb Pact API node serving the tellorflex,
 * f-TRB and coin modules. Reads and transactions mutate the fake state so a
 * reporter can run several iterations against it.
 */

import { Schema } from 'effect';
import { HttpResponse, http } from 'msw';
import { WEI } from '../../lib/chainweb/units.js';
import type { ChainwebEndpoint } from '../../lib/config.js';

export const TEST_NODE_URL = 'https://node.test/chainweb/0.0/testnet04/chain/1/pact/api/v1/';

export const testEndpoint: ChainwebEndpoint = {
  chainId: 1,
  network: 'testnet04',
  provider: 'test',
  url: TEST_NODE_URL,
  explorer: 'https://explorer.test/testnet',
  namespace: 'free',
};

const CommandBodySchema = Schema.Struct({ hash: Schema.String, cmd: Schema.String });
const SendBodySchema = Schema.Struct({ cmds: Schema.Array(CommandBodySchema) });
const PollBodySchema = Schema.Struct({ requestKeys: Schema.Array(Schema.String) });

const CapabilitySchema = Schema.Struct({ name: Schema.String, args: Schema.Array(Schema.Unknown) });

export const CommandSchema = Schema.Struct({
  networkId: Schema.NullOr(Schema.String),
  payload: Schema.Struct({
    exec: Schema.Struct({
      code: Schema.String,
      data: Schema.NullOr(Schema.Record({ key: Schema.String, value: Schema.Unknown })),
    }),
  }),
  signers: Schema.Array(Schema.Struct({ pubKey: Schema.String, clist: Schema.optional(Schema.Array(CapabilitySchema)) })),
  meta: Schema.Struct({
    chainId: Schema.String,
    sender: Schema.String,
    gasLimit: Schema.Number,
    gasPrice: Schema.Number,
    ttl: Schema.Number,
    creationTime: Schema.Number,
  }),
  nonce: Schema.String,
});

export type ParsedCommand = Schema.Schema.Type<typeof CommandSchema>;

const DepositDataSchema = Schema.Struct({ reporter: Schema.String, amount: Schema.Number });
const SubmitDataSchema = Schema.Struct({ queryId: Schema.String, staker: Schema.String });

export interface StakerRow {
  startDate: number;
  stakedBalance: bigint;
  lockedBalance: bigint;
  lastReport: number;
  reportsSubmitted: number;
  isStaked: boolean;
}

type TxStatus = 'success' | 'failure';

const success = (data: unknown) => ({ status: 'success', data });
const failure = (message: string) => ({ status: 'failure', error: { message } });

const parseCommand = (cmd: string): ParsedCommand => Schema.decodeUnknownSync(CommandSchema)(JSON.parse(cmd));

export class FakeChainweb {
  stakeAmount: bigint = 10n * WEI;
  readonly stakers = new Map<string, StakerRow>();
  readonly trbBalances = new Map<string, number>();
  readonly kdaBalances = new Map<string, number>();
  readonly valueCounts = new Map<string, number>();

  /** Pact code of every /local call, in order */
  readonly reads: string[] = [];
  /** Every command received on /send, in order */
  readonly sent: ParsedCommand[] = [];

  /** Number of upcoming polls that answer `{}` (transaction not mined yet) */
  pendingPolls = 0;
  failTransactions = false;
  nowSeconds: () => number = () => Math.floor(Date.now() / 1000);

  private readonly receipts = new Map<string, TxStatus>();

  constructor(
    readonly baseUrl: string = TEST_NODE_URL,
    readonly namespace: string = 'free',
  ) {}

  handlers() {
    return [
      http.post(`${this.baseUrl}local`, async ({ request }) => {
        const body = Schema.decodeUnknownSync(CommandBodySchema)(await request.json());
        const code = parseCommand(body.cmd).payload.exec.code;
        this.reads.push(code);
        return HttpResponse.json({ reqKey: body.hash, result: this.evaluate(code), txId: null, gas: 0 });
      }),

      http.post(`${this.baseUrl}send`, async ({ request }) => {
        const body = Schema.decodeUnknownSync(SendBodySchema)(await request.json());
        const requestKeys = body.cmds.map(({ hash, cmd }) => {
          const command = parseCommand(cmd);
          this.sent.push(command);
          this.receipts.set(hash, this.execute(command));
          return hash;
        });
        return HttpResponse.json({ requestKeys });
      }),

      http.post(`${this.baseUrl}poll`, async ({ request }) => {
        const body = Schema.decodeUnknownSync(PollBodySchema)(await request.json());
        if (this.pendingPolls > 0) {
          this.pendingPolls -= 1;
          return HttpResponse.json({});
        }
        const receipts = Object.fromEntries(
          body.requestKeys.flatMap((reqKey): Array<[string, unknown]> => {
            const status = this.receipts.get(reqKey);
            if (!status) return [];
            const result = status === 'success' ? success('Write succeeded') : failure('Tx Failed');
            return [[reqKey, { reqKey, result, txId: 1, gas: 500 }]];
          }),
        );
        return HttpResponse.json(receipts);
      }),

      http.get(new URL('/info', this.baseUrl).toString(), () => HttpResponse.json({ nodeVersion: 'testnet04' })),
    ];
  }

  staker(name: string, row: Partial<StakerRow> = {}): StakerRow {
    const staker: StakerRow = {
      startDate: 0,
      stakedBalance: 0n,
      lockedBalance: 0n,
      lastReport: 0,
      reportsSubmitted: 0,
      isStaked: true,
      ...row,
    };
    this.stakers.set(name, staker);
    return staker;
  }

  private evaluate(code: string) {
    const match = /^\((\S+)\s*(.*)\)$/.exec(code);
    const fn = match?.[1] ?? '';
    const arg = /"([^"]*)"/.exec(match?.[2] ?? '')?.[1] ?? '';
    const ns = this.namespace;

    switch (fn) {
      case `${ns}.tellorflex.stake-amount`:
        return success({ decimal: `${this.stakeAmount}.0` });

      case `${ns}.tellorflex.get-staker-info`: {
        const row = this.stakers.get(arg);
        if (!row) return failure(`with-read: row not found: ${arg}`);
        return success({
          'start-date': { int: row.startDate },
          'staked-balance': { int: row.stakedBalance.toString() },
          'locked-balance': { int: row.lockedBalance.toString() },
          'reward-debt': { int: 0 },
          'reporter-last-timestamp': { int: row.lastReport },
          'reports-submitted': { int: row.reportsSubmitted },
          'start-vote-count': { int: 0 },
          'start-vote-tally': { int: 0 },
          'is-staked': row.isStaked,
        });
      }

      case `${ns}.tellorflex.get-new-value-count-by-query-id`: {
        const count = this.valueCounts.get(arg);
        return count === undefined ? failure(`read: row not found: ${arg}`) : success({ int: count });
      }

      case `${ns}.f-TRB.get-balance`: {
        const balance = this.trbBalances.get(arg);
        return balance === undefined ? failure(`with-read: row not found: ${arg}`) : success(balance);
      }

      case 'coin.get-balance': {
        const balance = this.kdaBalances.get(arg);
        return balance === undefined ? failure(`with-read: row not found: ${arg}`) : success(balance);
      }

      default:
        return failure(`Cannot resolve ${fn}`);
    }
  }

  private execute(command: ParsedCommand): TxStatus {
    if (this.failTransactions) {
      return 'failure';
    }
    const { code, data } = command.payload.exec;

    if (code.includes('.tellorflex.deposit-stake')) {
      const { reporter, amount } = Schema.decodeUnknownSync(DepositDataSchema)(data);
      const row = this.stakers.get(reporter) ?? this.staker(reporter, { isStaked: false });
      row.stakedBalance += BigInt(amount);
      row.isStaked = true;
      row.startDate = row.startDate || this.nowSeconds();
      const wallet = this.trbBalances.get(reporter) ?? 0;
      this.trbBalances.set(reporter, wallet - amount / 1e18);
    }

    if (code.includes('.tellorflex.submit-value')) {
      const { queryId, staker } = Schema.decodeUnknownSync(SubmitDataSchema)(data);
      this.valueCounts.set(queryId, (this.valueCounts.get(queryId) ?? 0) + 1);
      const row = this.stakers.get(staker);
      if (row) {
        row.lastReport = this.nowSeconds();
        row.reportsSubmitted += 1;
      }
    }

    return 'success';
  }
}
