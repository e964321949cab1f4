/* src/runner/util/debug.ts
 * Opt-in notices for fallback paths. Emitted only at debug verbosity.
 */
import { log } from './log';

/** Log a concise fallback notice (scope: module:function; reason/message). */
export const debugFallback = (scope: string, reason: string): void => {
  log.debug(`fallback: ${scope}: ${reason}`);
};
