import vm from 'vm';
import { strict as assert } from 'assert';
import { DeliveryError, errorMessage } from '../src/utils/errors';

describe('errorMessage', () => {
  test('returns the message of an Error', () => {
    expect(errorMessage(new DeliveryError('peer unreachable', true))).toBe('peer unreachable');
  });

  test('returns the message of an assertion failure', () => {
    let thrown: unknown;
    try {
      assert(false, 'AGENT_SEED is missing');
    } catch (error) {
      thrown = error;
    }

    expect(errorMessage(thrown)).toBe('AGENT_SEED is missing');
  });

  test('returns the message of an error created in another realm', () => {
    const foreign: unknown = vm.runInNewContext('new Error("created elsewhere")');

    expect(foreign instanceof Error).toBe(false);
    expect(errorMessage(foreign)).toBe('created elsewhere');
  });

  test('stringifies values that carry no message', () => {
    expect(errorMessage('plain failure')).toBe('plain failure');
    expect(errorMessage({ message: 42 })).toBe('[object Object]');
    expect(errorMessage(null)).toBe('null');
  });
});
