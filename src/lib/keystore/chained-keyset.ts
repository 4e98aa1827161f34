/**
 * Chained keyset management
 *
 * Keysets are stored one JSON keyfile per account name, with every private key
 * encrypted under a password. Accounts load locked; `unlock()` must succeed
 * before the keys or the signing keyset can be accessed.
 */
import { existsSync, mkdirSync, readdirSync, readFileSync, unlinkSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { basename, extname, join } from 'node:path';
import { Effect, Schema } from 'effect';
import type { KeyPair } from '../chainweb/exec-cmd.js';
import {
  AccountExistsError,
  AccountLockedError,
  type DecryptionError,
  FileError,
  type KeystoreError,
  NotFoundError,
  ParseError,
  ValidationError,
} from '../effects/errors.js';
import { decrypt, DEFAULT_KDF, encrypt, type KdfLimits, restorePublicKey } from './keyfile.js';

const EncryptedKeySchema = Schema.Struct({
  ciphertext: Schema.String,
  nonce: Schema.String,
  salt: Schema.String,
  opslimit: Schema.optional(Schema.Number),
  memlimit: Schema.optional(Schema.Number),
});

export const AccountFileSchema = Schema.Struct({
  chains: Schema.Array(Schema.Number),
  pred: Schema.String,
  keystore_json: Schema.Array(EncryptedKeySchema),
  address: Schema.Array(Schema.String),
});

export type AccountFile = Schema.Schema.Type<typeof AccountFileSchema>;

export const defaultKeystoreDir = (): string => process.env.KADENA_KEYSTORE_DIR || join(homedir(), '.chained_accounts');

/**
 * Unlocked keyset: secret keys, their public keys and the keyset predicate
 */
export class LocalKeyset {
  readonly publicKeys: string[];

  constructor(
    readonly accountName: string,
    readonly keys: readonly string[],
    readonly pred: string,
  ) {
    this.publicKeys = keys.map(restorePublicKey);
  }

  /** Key pairs for signing, in keyfile order */
  signature(): KeyPair[] {
    return this.publicKeys.map((publicKey, i) => ({ publicKey, secretKey: this.keys[i] }));
  }

  /** The keyset guard as Pact expects it in env data */
  guard(): { pred: string; keys: string[] } {
    return { pred: this.pred, keys: [...this.publicKeys] };
  }
}

export class ChainedAccount {
  private localKeyset: LocalKeyset | null = null;

  constructor(
    readonly name: string,
    readonly keyfile: string,
    private readonly data: AccountFile,
  ) {}

  toString(): string {
    return `ChainedKeyset('${this.name}')`;
  }

  get chains(): number[] {
    return [...this.data.chains];
  }

  get address(): string[] {
    return [...this.data.address];
  }

  get predicate(): string {
    return this.data.pred;
  }

  get isUnlocked(): boolean {
    return this.localKeyset !== null;
  }

  /**
   * Decrypt keystore data. A no-op when the account is already unlocked.
   */
  unlock(password: string): Effect.Effect<void, KeystoreError | ValidationError | DecryptionError> {
    if (this.localKeyset) {
      return Effect.void;
    }
    return decrypt(this.data.keystore_json, password).pipe(
      Effect.map((keys) => {
        this.localKeyset = new LocalKeyset(this.name, keys, this.data.pred);
      }),
    );
  }

  lock(): void {
    this.localKeyset = null;
  }

  get keys(): Effect.Effect<string[], AccountLockedError> {
    return this.keyset.pipe(Effect.map((keyset) => [...keyset.keys]));
  }

  get keyset(): Effect.Effect<LocalKeyset, AccountLockedError> {
    const keyset = this.localKeyset;
    return keyset
      ? Effect.succeed(keyset)
      : Effect.fail(new AccountLockedError(`${this.name} ChainedAccount must be unlocked to access the private key.`));
  }
}

export interface AddKeysetOptions {
  name: string;
  pred: string;
  chains: number | readonly number[];
  keys: readonly string[];
  password: string;
  kdf?: KdfLimits;
}

export interface FindOptions {
  name?: string;
  chainId?: number;
  address?: readonly string[];
}

export class Keystore {
  constructor(readonly dir: string = defaultKeystoreDir()) {}

  keyfilePath(name: string): string {
    return join(this.dir, `${name}.json`);
  }

  exists(name: string): boolean {
    return existsSync(this.keyfilePath(name));
  }

  /** Names of all accounts in the keystore */
  listNames(): Effect.Effect<string[], FileError> {
    return Effect.try({
      try: () => {
        this.ensureDir();
        return readdirSync(this.dir)
          .filter((file) => extname(file) === '.json')
          .map((file) => basename(file, '.json'))
          .sort();
      },
      catch: (error) => new FileError(`Failed to list keystore: ${error}`, this.dir, error),
    });
  }

  get(name: string): Effect.Effect<ChainedAccount, NotFoundError | FileError | ParseError | ValidationError> {
    return Effect.flatMap(validateName(name), () => this.load(name));
  }

  private load(name: string): Effect.Effect<ChainedAccount, NotFoundError | FileError | ParseError> {
    const keyfile = this.keyfilePath(name);
    return Effect.gen(function* () {
      if (!existsSync(keyfile)) {
        return yield* Effect.fail(new NotFoundError(`Could not load keyfile: ${keyfile}`));
      }
      const raw = yield* Effect.try({
        try: (): unknown => JSON.parse(readFileSync(keyfile, 'utf-8')),
        catch: (error) => new FileError(`Failed to read keyfile: ${error}`, keyfile, error),
      });
      const data = yield* Schema.decodeUnknown(AccountFileSchema)(raw).pipe(
        Effect.mapError((error) => new ParseError(`Invalid keyfile ${keyfile}: ${error.message}`, 'keyfile', raw, error)),
      );
      return new ChainedAccount(name, keyfile, data);
    });
  }

  /**
   * Add a new keyset to the keystore. The keyfile is never overwritten.
   */
  addKeyset(
    options: AddKeysetOptions,
  ): Effect.Effect<ChainedAccount, AccountExistsError | ValidationError | KeystoreError | FileError> {
    const self = this;
    return Effect.gen(function* () {
      const { name, pred, keys, password } = options;
      const chains = typeof options.chains === 'number' ? [options.chains] : [...options.chains];

      yield* validateName(name);
      if (keys.length === 0) {
        return yield* Effect.fail(new ValidationError('At least one private key is required', 'keys'));
      }
      if (chains.length === 0) {
        return yield* Effect.fail(new ValidationError('At least one chain id is required', 'chains'));
      }

      const names = yield* self.listNames();
      if (names.includes(name)) {
        return yield* Effect.fail(new AccountExistsError(`Account ${name} already exists`));
      }

      const address = yield* Effect.try({
        try: () => keys.map(restorePublicKey),
        catch: (error) =>
          error instanceof ValidationError ? error : new ValidationError(`Invalid private key: ${error}`, 'keys'),
      });
      const keystoreJson = yield* encrypt(keys, password, options.kdf ?? DEFAULT_KDF);
      const data: AccountFile = { chains, pred, keystore_json: keystoreJson, address };

      const keyfile = self.keyfilePath(name);
      yield* Effect.try({
        try: () => writeFileSync(keyfile, JSON.stringify(data, null, 2), { encoding: 'utf-8', flag: 'wx', mode: 0o600 }),
        catch: (error) => new FileError(`Keyfile already exists or is not writable: ${keyfile}`, keyfile, error),
      });

      return new ChainedAccount(name, keyfile, data);
    });
  }

  /**
   * Search for matching accounts. Without filters every account is returned.
   */
  find(options: FindOptions = {}): Effect.Effect<ChainedAccount[], FileError | ParseError | NotFoundError> {
    const self = this;
    return Effect.gen(function* () {
      const names = yield* self.listNames();
      const accounts = yield* Effect.forEach(names, (name) => self.load(name));

      return accounts.filter((account) => {
        if (options.name !== undefined && options.name !== account.name) return false;
        if (options.chainId !== undefined && !account.chains.includes(options.chainId)) return false;
        if (options.address !== undefined && !sameAddresses(options.address, account.address)) return false;
        return true;
      });
    });
  }

  delete(name: string): Effect.Effect<void, NotFoundError | FileError | ValidationError> {
    const keyfile = this.keyfilePath(name);
    return Effect.gen(function* () {
      yield* validateName(name);
      if (!existsSync(keyfile)) {
        return yield* Effect.fail(new NotFoundError(`Account ${name} does not exist.`));
      }
      yield* Effect.try({
        try: () => unlinkSync(keyfile),
        catch: (error) => new FileError(`Failed to delete keyfile: ${error}`, keyfile, error),
      });
    });
  }

  private ensureDir(): void {
    if (!existsSync(this.dir)) {
      mkdirSync(this.dir, { recursive: true, mode: 0o700 });
    }
  }
}

// Account names become keyfile names inside the keystore directory
const validateName = (name: string): Effect.Effect<void, ValidationError> =>
  !name || /[\s/\\]/.test(name)
    ? Effect.fail(new ValidationError(`Invalid account name: "${name}"`, 'name', name))
    : Effect.void;

const sameAddresses = (a: readonly string[], b: readonly string[]): boolean =>
  a.length === b.length && a.every((key, i) => key === b[i]);
