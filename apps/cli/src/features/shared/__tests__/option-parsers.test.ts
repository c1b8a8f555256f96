import { describe, expect, it } from 'vitest';

import { parseIntegerOption, parsePageOptions } from '../option-parsers.ts';

describe('parseIntegerOption', () => {
  it('leaves absent options undefined', () => {
    expect(parseIntegerOption(undefined, 'limit')._unsafeUnwrap()).toBeUndefined();
  });

  it('parses signed integers', () => {
    expect(parseIntegerOption(' 25 ', 'limit')._unsafeUnwrap()).toBe(25);
    expect(parseIntegerOption('-1', 'page')._unsafeUnwrap()).toBe(-1);
  });

  it('rejects non-integers with the option name', () => {
    const error = parseIntegerOption('2.5', 'page')._unsafeUnwrapErr();

    expect(error.message).toBe('Option --page must be an integer, got "2.5"');
    expect(error.option).toBe('page');
  });
});

describe('parsePageOptions', () => {
  it('parses both values', () => {
    expect(parsePageOptions({ limit: '10', page: '3' })._unsafeUnwrap()).toEqual({ limit: 10, page: 3 });
  });

  it('reports the first bad option', () => {
    expect(parsePageOptions({ limit: 'ten', page: '1' })._unsafeUnwrapErr().option).toBe('limit');
  });
});
