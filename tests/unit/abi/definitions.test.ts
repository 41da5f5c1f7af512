import { describe, it, expect } from 'vitest';
import { parseEventDefinitions } from '../../../src/abi/definitions.js';
import { ERC20_ABI } from '../../fixtures/abis.js';

describe('parseEventDefinitions', () => {
  it('extracts events in ABI order and skips other entries', () => {
    const definitions = parseEventDefinitions(JSON.stringify(ERC20_ABI));

    expect(definitions).toEqual([
      {
        name: 'Transfer',
        inputs: [
          { name: 'from', type: 'address', indexed: true },
          { name: 'to', type: 'address', indexed: true },
          { name: 'value', type: 'uint256', indexed: false },
        ],
      },
      {
        name: 'Approval',
        inputs: [
          { name: 'owner', type: 'address', indexed: true },
          { name: 'spender', type: 'address', indexed: true },
          { name: 'value', type: 'uint256', indexed: false },
        ],
      },
    ]);
  });

  it('defaults missing inputs, names and indexed flags', () => {
    const abi = JSON.stringify([
      { type: 'event', name: 'Paused' },
      { type: 'event', name: 'Set', inputs: [{ type: 'uint256' }] },
    ]);

    expect(parseEventDefinitions(abi)).toEqual([
      { name: 'Paused', inputs: [] },
      { name: 'Set', inputs: [{ name: '', type: 'uint256', indexed: false }] },
    ]);
  });

  it('skips entries that are not objects', () => {
    const abi = JSON.stringify([1, 'text', null, { type: 'event', name: 'Ping', inputs: [] }]);
    expect(parseEventDefinitions(abi)).toEqual([{ name: 'Ping', inputs: [] }]);
  });

  it('returns an empty list for an ABI without events', () => {
    expect(parseEventDefinitions('[]')).toEqual([]);
    expect(parseEventDefinitions(JSON.stringify([ERC20_ABI[0]]))).toEqual([]);
  });

  it('returns null for text that is not JSON', () => {
    expect(parseEventDefinitions('not json')).toBeNull();
  });

  it('returns null for JSON that is not an array', () => {
    expect(parseEventDefinitions('{"type":"event","name":"Ping"}')).toBeNull();
  });

  it('returns null for an event without a name', () => {
    expect(parseEventDefinitions('[{"type":"event","inputs":[]}]')).toBeNull();
  });

  it('returns null for a parameter without a type', () => {
    expect(parseEventDefinitions('[{"type":"event","name":"Ping","inputs":[{"name":"x"}]}]')).toBeNull();
  });
});
