/* src/runner/util/color.ts
 * Styles for ptx output. Plain text when PTX_BORING, NO_COLOR or
 * FORCE_COLOR=0 is set, or when the target stream is not a terminal.
 */
import chalk, { type ChalkInstance } from 'chalk';

type Stream = 'stdout' | 'stderr';

export const isBoring = (stream: Stream = 'stdout'): boolean =>
  // Read env and isTTY on every call so tests can toggle them.
  process.env.PTX_BORING === '1' ||
  process.env.NO_COLOR === '1' ||
  process.env.FORCE_COLOR === '0' ||
  !process[stream].isTTY;

const styled =
  (stream: Stream, pick: (c: ChalkInstance) => ChalkInstance) =>
  (s: string): string =>
    isBoring(stream) ? s : pick(chalk)(s);

/** Success messages. */
export const ok = styled('stdout', (c) => c.green);
export const bold = styled('stdout', (c) => c.bold);
export const dim = styled('stdout', (c) => c.dim);

/** Level tags on stderr. */
export const error = styled('stderr', (c) => c.red);
export const warn = styled('stderr', (c) => c.hex('#FFA500'));
export const strong = styled('stderr', (c) => c.bold);
