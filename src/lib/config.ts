import { chmodSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { Effect, pipe, Schema } from 'effect';
import { FileError, NotFoundError, ParseError, ValidationError } from './effects/errors.js';

export const CHAINWEB_API_VERSION = '0.0';

export const NETWORKS = ['testnet04', 'mainnet01'] as const;
export type Network = (typeof NETWORKS)[number];

const NETWORK_ALIASES: Record<string, Network> = {
  testnet: 'testnet04',
  testnet04: 'testnet04',
  mainnet: 'mainnet01',
  mainnet01: 'mainnet01',
};

/**
 * Accepts the Chainweb network ids and their short aliases ("testnet", "mainnet").
 */
export const normalizeNetwork = (value: string): Network | undefined => NETWORK_ALIASES[value.toLowerCase()];

export const ChainwebEndpointSchema = Schema.Struct({
  chainId: Schema.Number,
  network: Schema.String,
  provider: Schema.String,
  url: Schema.String.pipe(Schema.pattern(/^https?:\/\/.+\/$/)), // Pact API base, must end with '/'
  explorer: Schema.optional(Schema.String),
  namespace: Schema.optional(Schema.String),
});

export type ChainwebEndpoint = Schema.Schema.Type<typeof ChainwebEndpointSchema>;

const EndpointListSchema = Schema.Struct({
  endpoints: Schema.Array(ChainwebEndpointSchema),
});

const MainConfigSchema = Schema.Struct({
  loglevel: Schema.Literal('debug', 'info', 'warn', 'error'),
  chainId: Schema.Number,
  network: Schema.Literal(...NETWORKS),
});

export type MainConfig = Schema.Schema.Type<typeof MainConfigSchema>;

export interface KadenaConfig {
  main: MainConfig;
  endpoints: ChainwebEndpoint[];
}

// api reference https://api.chainweb.com/openapi/pact.html
export const DEFAULT_ENDPOINTS: readonly ChainwebEndpoint[] = [
  {
    chainId: 1,
    provider: 'Kadena',
    network: 'mainnet01',
    url: `https://api.chainweb.com/chainweb/${CHAINWEB_API_VERSION}/mainnet01/chain/1/pact/api/v1/`,
    explorer: 'https://explorer.chainweb.com/mainnet',
  },
  {
    chainId: 1,
    provider: 'Kadena',
    network: 'testnet04',
    url: `https://api.testnet.chainweb.com/chainweb/${CHAINWEB_API_VERSION}/testnet04/chain/1/pact/api/v1/`,
    explorer: 'https://explorer.chainweb.com/testnet',
  },
];

export const DEFAULT_MAIN_CONFIG: MainConfig = {
  loglevel: 'info',
  chainId: 1,
  network: 'testnet04',
};

export const defaultConfigDir = (): string => process.env.KADENA_CONFIG_DIR || join(homedir(), '.kadena-reporter');

// ============= Endpoint lookup =============
export function findEndpoints(
  endpoints: readonly ChainwebEndpoint[],
  { chainId, network }: { chainId?: number; network?: string } = {},
): ChainwebEndpoint[] {
  return endpoints.filter(
    (endpoint) =>
      (chainId === undefined || endpoint.chainId === chainId) && (network === undefined || endpoint.network === network),
  );
}

export function getChainEndpoint(endpoints: readonly ChainwebEndpoint[], chainId = 1): ChainwebEndpoint | undefined {
  return endpoints.find((endpoint) => endpoint.chainId === chainId);
}

/**
 * First endpoint matching the configured network and chain id
 */
export function getEndpoint(config: KadenaConfig): Effect.Effect<ChainwebEndpoint, NotFoundError> {
  const [endpoint] = findEndpoints(config.endpoints, { network: config.main.network, chainId: config.main.chainId });
  return endpoint
    ? Effect.succeed(endpoint)
    : Effect.fail(new NotFoundError(`Endpoint not found for chain_id=${config.main.chainId}`));
}

// ============= Config files =============
export class ConfigManager {
  readonly configDir: string;
  readonly mainFile: string;
  readonly endpointsFile: string;

  constructor(configDir: string = defaultConfigDir()) {
    this.configDir = configDir;
    this.mainFile = join(this.configDir, 'config.json');
    this.endpointsFile = join(this.configDir, 'endpoints.json');
  }

  /**
   * Effective configuration: file contents where present, defaults otherwise
   */
  getConfig(): Effect.Effect<KadenaConfig, FileError | ParseError | ValidationError> {
    return Effect.all({
      main: this.readFile(this.mainFile, MainConfigSchema, DEFAULT_MAIN_CONFIG),
      endpoints: pipe(
        this.readFile(this.endpointsFile, EndpointListSchema, { endpoints: DEFAULT_ENDPOINTS }),
        Effect.map((list) => [...list.endpoints]),
      ),
    }).pipe(Effect.map(({ main, endpoints }) => ({ main: { ...main }, endpoints })));
  }

  /**
   * Write default configuration files that do not exist yet.
   * Returns the paths that were created.
   */
  init(): Effect.Effect<string[], FileError> {
    const self = this;
    return Effect.gen(function* () {
      const created: string[] = [];
      if (!existsSync(self.mainFile)) {
        yield* self.writeFile(self.mainFile, DEFAULT_MAIN_CONFIG);
        created.push(self.mainFile);
      }
      if (!existsSync(self.endpointsFile)) {
        yield* self.writeFile(self.endpointsFile, { endpoints: DEFAULT_ENDPOINTS });
        created.push(self.endpointsFile);
      }
      return created;
    });
  }

  saveMain(main: MainConfig): Effect.Effect<void, FileError | ValidationError> {
    return pipe(
      Schema.decodeUnknown(MainConfigSchema)(main),
      Effect.mapError((error) => new ValidationError(`Invalid config: ${error.message}`, 'main', main, error)),
      Effect.flatMap((validated) => this.writeFile(this.mainFile, validated)),
    );
  }

  saveEndpoints(endpoints: readonly ChainwebEndpoint[]): Effect.Effect<void, FileError | ValidationError> {
    return pipe(
      Schema.decodeUnknown(EndpointListSchema)({ endpoints }),
      Effect.mapError((error) => new ValidationError(`Invalid endpoint: ${error.message}`, 'endpoints', endpoints, error)),
      Effect.flatMap((validated) => this.writeFile(this.endpointsFile, validated)),
    );
  }

  private readFile<A, I>(
    path: string,
    schema: Schema.Schema<A, I>,
    fallback: A,
  ): Effect.Effect<A, FileError | ParseError | ValidationError> {
    if (!existsSync(path)) {
      return Effect.succeed(fallback);
    }
    return pipe(
      Effect.try({
        try: () => readFileSync(path, 'utf-8'),
        catch: (error) => new FileError(`Failed to read config file: ${error}`, path, error),
      }),
      Effect.flatMap((contents) =>
        Effect.try({
          try: (): unknown => JSON.parse(contents),
          catch: (error) => new ParseError(`Invalid JSON in config file ${path}: ${error}`, path, contents, error),
        }),
      ),
      Effect.flatMap((parsed) =>
        Schema.decodeUnknown(schema)(parsed).pipe(
          Effect.mapError((error) => new ValidationError(`Invalid config schema in ${path}: ${error.message}`, path, parsed)),
        ),
      ),
    );
  }

  private writeFile(path: string, contents: unknown): Effect.Effect<void, FileError> {
    return Effect.try({
      try: () => {
        if (!existsSync(this.configDir)) {
          mkdirSync(this.configDir, { recursive: true });
        }
        writeFileSync(path, `${JSON.stringify(contents, null, 2)}\n`, 'utf-8');
        chmodSync(path, 0o600);
      },
      catch: (error) => new FileError(`Failed to write config file: ${error}`, path, error),
    });
  }
}
