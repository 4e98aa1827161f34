import { password } from '@inquirer/prompts';
import { Effect } from 'effect';
import { ConfigError, ConfirmPasswordError, errorMessage } from '../../lib/effects/errors.js';

// Inquirer rejects with ExitPromptError on Ctrl+C
export const prompt = <A>(ask: () => Promise<A>): Effect.Effect<A, ConfigError> =>
  Effect.tryPromise({
    try: ask,
    catch: (error) => new ConfigError(`Prompt cancelled: ${errorMessage(error)}`, error),
  });

/**
 * Ask for a new encryption password twice
 */
export const askForPassword = (name: string): Effect.Effect<string, ConfigError | ConfirmPasswordError> =>
  Effect.gen(function* () {
    const first = yield* prompt(() => password({ message: `Enter encryption password for ${name}:`, mask: true }));
    const second = yield* prompt(() => password({ message: 'Confirm password:', mask: true }));
    if (first !== second) {
      return yield* Effect.fail(new ConfirmPasswordError(`Account: ${name}`));
    }
    return first;
  });

/** Password confirmation with one retry after a mismatch */
export const askForNewPassword = (name: string): Effect.Effect<string, ConfigError | ConfirmPasswordError> =>
  askForPassword(name).pipe(
    Effect.catchTag('ConfirmPasswordError', () =>
      Effect.sync(() => console.log('Passwords do not match. Try again.')).pipe(
        Effect.flatMap(() => askForPassword(name)),
      ),
    ),
  );

export const askForAccountPassword = (name: string): Effect.Effect<string, ConfigError> =>
  prompt(() => password({ message: `Enter password for ${name} account:`, mask: true }));
