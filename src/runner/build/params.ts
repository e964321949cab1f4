// src/runner/build/params.ts
import { FatalError } from '../errors';
import { emptyParams, type StringParams } from '../project/types';

/**
 * Parse repeated `--param key:value` entries. The value is everything after
 * the first colon, so `--param url:https://x.org` keeps its scheme.
 * Later entries override earlier ones.
 */
export const parseStringParams = (entries: readonly string[]): StringParams => {
  const out = emptyParams();
  for (const entry of entries) {
    const at = entry.indexOf(':');
    if (at < 0) {
      throw new FatalError(
        `string parameter "${entry}" must have the form key:value`,
      );
    }
    const key = entry.slice(0, at).trim();
    if (!key) {
      throw new FatalError(`string parameter "${entry}" has an empty key`);
    }
    out[key] = entry.slice(at + 1).trim();
  }
  return out;
};
