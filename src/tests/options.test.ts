/**
 * Tests for CLI option parsing
 */

import { parseExtensions, parsePort } from '../cli/options';

describe('parseExtensions', () => {
  it('adds the leading dot and trims whitespace', () => {
    expect(parseExtensions('ts, .tsx ,js')).toEqual(['.ts', '.tsx', '.js']);
  });

  it('rejects an empty list', () => {
    expect(() => parseExtensions(' , ')).toThrow('No extensions in " , "');
  });
});

describe('parsePort', () => {
  it('accepts a port number', () => {
    expect(parsePort('8080')).toBe(8080);
  });

  it.each(['abc', '-1', '70000', '1.5'])('rejects %s', (value) => {
    expect(() => parsePort(value)).toThrow(`Invalid port: ${value}`);
  });
});
