import type { ChainwebEndpoint } from '../../lib/config.js';
import type { ChainedAccount } from '../../lib/keystore/chained-keyset.js';

/**
 * Bracketed list as printed by the CLI: ['ab12', 'cd34'] or [0, 1]
 */
export function formatList(values: readonly (string | number)[]): string {
  return `[${values.map((value) => (typeof value === 'string' ? `'${value}'` : String(value))).join(', ')}]`;
}

export const formatAccountLine = (account: ChainedAccount): string =>
  `Account name: ${account.name}, address: ${formatList(account.address)}, chain IDs: ${formatList(account.chains)}`;

export const formatAddedAccount = (account: ChainedAccount): string =>
  `Added new account ${account.name} (address= ${formatList(account.address)}) for use on chains ${formatList(account.chains)}`;

export function formatEndpoint(endpoint: ChainwebEndpoint): string {
  return [
    `Your ${endpoint.network} endpoint: `,
    ` - provider: ${endpoint.provider}`,
    ` - RPC url: ${endpoint.url}`,
    ` - explorer url: ${endpoint.explorer ?? 'none'}`,
  ].join('\n');
}
