import chalk from 'chalk';
import { Console, Effect, pipe } from 'effect';
import { ConfigManager } from '../../lib/config.js';

const reportError = (error: { message: string }) => Console.error(chalk.red('Error:'), error.message);

const configInitEffect = (configManager: ConfigManager) =>
  pipe(
    configManager.init(),
    Effect.tap((created) =>
      created.length === 0
        ? Console.log(`Configuration files already exist in ${configManager.configDir}`)
        : Effect.forEach(created, (path) => Console.log(chalk.green(`Created ${path}`)), { discard: true }),
    ),
    Effect.tapError(reportError),
  );

const configShowEffect = (configManager: ConfigManager) =>
  pipe(
    configManager.getConfig(),
    Effect.tap((config) => Console.log(JSON.stringify(config, null, 2))),
    Effect.tapError(reportError),
  );

/** Write the default config.json and endpoints.json where missing */
export async function configInit(configManager: ConfigManager = new ConfigManager()) {
  try {
    await Effect.runPromise(configInitEffect(configManager));
  } catch (_error) {
    process.exit(1);
  }
}

/** Print the effective configuration */
export async function configShow(configManager: ConfigManager = new ConfigManager()) {
  try {
    await Effect.runPromise(configShowEffect(configManager));
  } catch (_error) {
    process.exit(1);
  }
}
