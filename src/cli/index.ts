import { readFileSync } from 'node:fs';
import chalk from 'chalk';
import { Effect, Schema } from 'effect';
import { configInit, configShow } from './commands/config.js';
import { keysetAdd, keysetDelete, keysetFind, keysetKey } from './commands/keyset.js';
import { report } from './commands/report.js';
import { parseReportOptions } from './utils/options.js';

const PackageInfoSchema = Schema.Struct({ version: Schema.String });

export function packageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
  return Schema.decodeUnknownSync(PackageInfoSchema)(raw).version;
}

// Command-specific help functions

function showConfigHelp() {
  console.log(`
${chalk.bold('kadena config - Manage reporter configuration')}

${chalk.yellow('Usage:')}
  kadena config <subcommand>

${chalk.yellow('Subcommands:')}
  init                      Create config.json and endpoints.json with defaults
  show                      Print the current configuration as JSON

${chalk.yellow('Environment:')}
  KADENA_CONFIG_DIR         Configuration directory (default ~/.kadena-reporter)
  KADENA_LOG_LEVEL          debug, info, warn or error
`);
}

function showKeysetHelp() {
  console.log(`
${chalk.bold('kadena keyset - Manage encrypted keysets')}

${chalk.yellow('Usage:')}
  kadena keyset <subcommand> [options]

${chalk.yellow('Subcommands:')}
  add <name> "<keys>" <pred> <chain-id...>   Encrypt and store a new keyset
      --password <password>                  Skip the password prompt
      --kdf <profile>                        interactive, moderate or sensitive (default)
  find [options]                             List keysets
      --name <name>                          Filter by account name
      --address "<pub> <pub>"                Filter by public keys
      --chain-id <id>                        Filter by chain id
  key <name> [-p|--password <password>]      Print the private keys of a keyset
  delete <name>                              Delete a keyset

${chalk.yellow('Environment:')}
  KADENA_KEYSTORE_DIR                        Keystore directory (default ~/.chained_accounts)

${chalk.yellow('Examples:')}
  kadena keyset add k:abc1 "<private key>" keys-all 1
  kadena keyset find --chain-id 1
`);
}

function showReportHelp() {
  console.log(`
${chalk.bold('kadena report - Report values to the TellorFlex oracle')}

${chalk.yellow('Usage:')}
  kadena report --account <name> --network <network> [options]

${chalk.yellow('Description:')}
  Stakes TRB when needed and submits SpotPrice values on an interval.
  The oracle modules are only deployed on chain 1.

${chalk.yellow('Options:')}
  -a,   --account <name>                 Keyset name; must match the gas account (required)
  -n,   --network <network>              testnet04 or mainnet01 (required)
  -qt,  --query-tag <tag>                Report a single catalog query, e.g. eth-usd-spot
  -b,   --build-spot                     Build a SpotPrice query from prompts
  -gl,  --gas-limit <n>                  Gas limit (default 150000)
  -gp,  --gas-price <n>                  Gas price (default 1e-7)
  -wp,  --wait-period <seconds>          Seconds between reports (default 7)
  -s,   --stake <trb>                    Desired total stake (default 10)
  -mnb, --min-native-token-balance <n>   KDA needed to report (default 0.25)
        --submit-once                    Submit one value and exit
        --submit-continuous              Keep reporting (default)
  -pwd, --password <password>            Keyset password
  -y,   --yes                            Skip confirmations
`);
}

function showHelp() {
  console.log(`
${chalk.bold('kadena - TellorFlex oracle reporter for Kadena')}

${chalk.yellow('Configuration:')}
  kadena config init                   Write default configuration files
  kadena config show                   Show the current configuration

${chalk.yellow('Keysets:')}
  kadena keyset add ...                Add an encrypted keyset
  kadena keyset find [options]         Find keysets
  kadena keyset key <name>             Show the private keys of a keyset
  kadena keyset delete <name>          Delete a keyset

${chalk.yellow('Reporting:')}
  kadena report -a <name> -n <net>     Report values (modules live on chain 1 only)

${chalk.yellow('Help:')}
  kadena help                          Show this help message
  kadena [command] --help              Show help for a specific command
  kadena --version                     Show the version
`);
}

export async function main(args: string[]): Promise<void> {
  if (args.length === 0 || args[0] === 'help' || args[0] === '--help' || args[0] === '-h') {
    showHelp();
    return;
  }
  if (args[0] === '--version' || args[0] === '-v') {
    console.log(`Version: ${packageVersion()}`);
    return;
  }

  const [command, subcommand, ...rest] = args;
  const wantsHelp = args.includes('--help');

  switch (command) {
    case 'config':
      if (wantsHelp) {
        showConfigHelp();
        return;
      }
      switch (subcommand) {
        case 'init':
          await configInit();
          return;
        case 'show':
          await configShow();
          return;
        default:
          console.error(chalk.red(`Unknown config subcommand: ${subcommand ?? '(none)'}`));
          showConfigHelp();
          process.exit(1);
      }
      return;

    case 'keyset':
      if (wantsHelp) {
        showKeysetHelp();
        return;
      }
      switch (subcommand) {
        case 'add':
          await keysetAdd(rest);
          return;
        case 'find':
          await keysetFind(rest);
          return;
        case 'key':
          await keysetKey(rest);
          return;
        case 'delete':
          await keysetDelete(rest);
          return;
        default:
          console.error(chalk.red(`Unknown keyset subcommand: ${subcommand ?? '(none)'}`));
          showKeysetHelp();
          process.exit(1);
      }
      return;

    case 'report': {
      if (wantsHelp) {
        showReportHelp();
        return;
      }
      const options = await Effect.runPromise(Effect.either(parseReportOptions(args.slice(1))));
      if (options._tag === 'Left') {
        console.error(chalk.red(options.left.message));
        showReportHelp();
        process.exit(1);
        return;
      }
      await report(options.right);
      return;
    }

    default:
      console.error(chalk.red(`Unknown command: ${command}`));
      console.log('Run "kadena help" for usage information');
      process.exit(1);
  }
}
