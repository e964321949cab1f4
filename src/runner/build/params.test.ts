import { describe, expect, it } from 'vitest';

import { parseStringParams } from './params';

describe('parseStringParams', () => {
  it('splits on the first colon and trims both sides', () => {
    expect(
      parseStringParams([' debug.datedfiles : no', 'url:https://example.org']),
    ).toEqual({ 'debug.datedfiles': 'no', url: 'https://example.org' });
  });

  it('lets later entries override earlier ones', () => {
    expect(parseStringParams(['a:1', 'a:2'])).toEqual({ a: '2' });
  });

  it('keeps empty values', () => {
    expect(parseStringParams(['flag:'])).toEqual({ flag: '' });
  });

  it('rejects entries without a colon', () => {
    expect(() => parseStringParams(['nocolon'])).toThrow(
      'string parameter "nocolon" must have the form key:value',
    );
  });

  it('rejects empty keys', () => {
    expect(() => parseStringParams([' :value'])).toThrow(
      'string parameter " :value" has an empty key',
    );
  });

  it('stores keys that name Object.prototype members', () => {
    const params = parseStringParams(['__proto__:x', 'constructor:y']);
    expect(Object.entries(params)).toEqual([
      ['__proto__', 'x'],
      ['constructor', 'y'],
    ]);
  });
});
