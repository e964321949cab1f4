// src/runner/version.ts
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

const packageJsonSchema = z.object({ version: z.string() }).passthrough();

/** Version from the package's own package.json ("0.0.0" when unreadable). */
export const getVersion = (): string => {
  try {
    const file = fileURLToPath(new URL('../../package.json', import.meta.url));
    const parsed = packageJsonSchema.safeParse(
      JSON.parse(readFileSync(file, 'utf8')),
    );
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
};
