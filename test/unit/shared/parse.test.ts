import { describe, it, expect } from '@jest/globals';
import { NumberFormatError } from '../../../src/errors';
import { parseIntegerProperty } from '../../../src/shared/parse';

describe('parseIntegerProperty', () => {
  it.each([
    ['3', 3],
    ['8080', 8080],
    ['+7', 7],
    ['-2', -2],
    ['007', 7],
  ])('parses %s', (value, expected) => {
    expect(parseIntegerProperty('deployer.count', value)).toBe(expected);
  });

  it.each(['', ' 3', '3x', '1.5', 'three', '1e3', '99999999999999999999'])(
    'rejects %p',
    (value) => {
      expect(() => parseIntegerProperty('deployer.count', value)).toThrow(NumberFormatError);
    },
  );

  it('names the property and value in the error', () => {
    expect(() => parseIntegerProperty('server.port', 'http')).toThrow(
      "Property 'server.port' is not an integer: 'http'",
    );
  });
});
