/* src/cli/config/schema.ts
 * Zod schemas for ptx.config.* (CLI defaults and engine locations).
 */
import { z } from 'zod';

import { LOG_LEVELS } from '../../runner/util/log';

// Common coercer for boolean-ish values
const coerceBool = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((v) => {
    if (typeof v === 'boolean') return v;
    if (typeof v === 'number') return v === 1;
    const s = v.trim().toLowerCase();
    if (s === '1' || s === 'true') return true;
    if (s === '0' || s === 'false') return false;
    return undefined;
  })
  .optional();

export const DIAGRAM_FORMATS = ['svg', 'pdf', 'eps', 'tex'] as const;
export type DiagramFormat = (typeof DIAGRAM_FORMATS)[number];

export const ACCESS_MODES = ['private', 'public'] as const;
export type AccessMode = (typeof ACCESS_MODES)[number];

const lowerEnum = <T extends readonly [string, ...string[]]>(values: T) =>
  z.preprocess(
    (v) => (typeof v === 'string' ? v.trim().toLowerCase() : v),
    z.enum(values),
  );

const cliDefaultsBuildSchema = z
  .object({ diagramsFormat: lowerEnum(DIAGRAM_FORMATS).optional() })
  .strict()
  .optional();

const cliDefaultsViewSchema = z
  .object({
    access: lowerEnum(ACCESS_MODES).optional(),
    port: z.coerce.number().int().min(1).max(65535).optional(),
  })
  .strict()
  .optional();

export const cliDefaultsSchema = z
  .object({
    verbosity: lowerEnum(LOG_LEVELS).optional(),
    boring: coerceBool,
    build: cliDefaultsBuildSchema,
    view: cliDefaultsViewSchema,
  })
  .strict()
  .optional();
export type CliDefaults = z.infer<typeof cliDefaultsSchema>;

const nonEmpty = z.string().trim().min(1);

export const engineSchema = z
  .object({
    /** Engine distribution root holding xsl/, pretext/pretext and schema/. */
    root: nonEmpty.optional(),
    xsl: nonEmpty.optional(),
    script: nonEmpty.optional(),
    schema: nonEmpty.optional(),
    xsltproc: nonEmpty.optional(),
    xmllint: nonEmpty.optional(),
    latex: nonEmpty.optional(),
    python: nonEmpty.optional(),
    /** Seconds of inactivity before an engine process is terminated (0 = never). */
    timeout: z.coerce.number().int().min(0).optional(),
  })
  .strict()
  .optional();
export type EngineConfig = z.infer<typeof engineSchema>;

export const webworkSchema = z
  .object({ server: z.string().url().optional() })
  .strict()
  .optional();

export const cliConfigSchema = z
  .object({
    cliDefaults: cliDefaultsSchema,
    engine: engineSchema,
    webwork: webworkSchema,
  })
  .strict();
export type CliConfig = z.infer<typeof cliConfigSchema>;
