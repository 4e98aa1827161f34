export type PactArgument = string | number | bigint | boolean;

/**
 * Assemble a Pact function call from a qualified function name and its arguments.
 * Arguments are emitted in insertion order: strings are quoted, everything else is literal.
 *
 * @example
 * assembleCode('free.tellorflex.get-staker-info', { staker: 'reporter1' })
 * // => '(free.tellorflex.get-staker-info "reporter1")'
 */
export function assembleCode(fn: string, args: Readonly<Record<string, PactArgument>> = {}): string {
  const formatted = Object.values(args).map(formatArgument);
  return `(${fn} ${formatted.join(' ')})`;
}

const formatArgument = (value: PactArgument): string => {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'boolean':
      return value ? 'true' : 'false';
    default:
      return value.toString();
  }
};
