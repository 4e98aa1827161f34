import { describe, expect, it } from 'vitest';
import { testEndpoint } from '../../test/mocks/chainweb.js';
import { ChainedAccount } from '../../lib/keystore/chained-keyset.js';
import { formatAccountLine, formatAddedAccount, formatEndpoint, formatList } from './account.js';

const account = new ChainedAccount('reporter1', '/keystore/reporter1.json', {
  chains: [0, 1],
  pred: 'keys-all',
  keystore_json: [],
  address: ['ab12', 'cd34'],
});

describe('account formatters', () => {
  it('formats lists with quoted strings', () => {
    expect(formatList(['ab12', 'cd34'])).toBe("['ab12', 'cd34']");
    expect(formatList([0, 1])).toBe('[0, 1]');
    expect(formatList([])).toBe('[]');
  });

  it('formats an account line', () => {
    expect(formatAccountLine(account)).toBe("Account name: reporter1, address: ['ab12', 'cd34'], chain IDs: [0, 1]");
  });

  it('formats a newly added account', () => {
    expect(formatAddedAccount(account)).toBe(
      "Added new account reporter1 (address= ['ab12', 'cd34']) for use on chains [0, 1]",
    );
  });

  it('formats an endpoint', () => {
    expect(formatEndpoint(testEndpoint).split('\n')).toEqual([
      'Your testnet04 endpoint: ',
      ' - provider: test',
      ` - RPC url: ${testEndpoint.url}`,
      ' - explorer url: https://explorer.test/testnet',
    ]);
    expect(formatEndpoint({ ...testEndpoint, explorer: undefined })).toContain(' - explorer url: none');
  });
});
