/* src/runner/util/debug-scopes.ts
 * Centralized labels for debugFallback notices.
 * Tests reference these exact tokens in expectations.
 */

/** cli config loader: no ptx.config.* found */
export const DBG_SCOPE_CLI_CONFIG_MISSING = 'cli.config:missing';

/** build: publication file absent; built-in template used */
export const DBG_SCOPE_BUILD_PUBLICATION_DEFAULT = 'build.publication:default';

/** build: publication lacks source/directories */
export const DBG_SCOPE_BUILD_PUBLICATION_DIRECTORIES =
  'build.publication:directories';

/** build: schema validation skipped (no schema or no xmllint) */
export const DBG_SCOPE_BUILD_SCHEMA_SKIPPED = 'build.schema:skipped';
