/**
 * cmdfor version, printed by `--version`.
 *
 * Keep in step with the "version" field of the root package.json.
 */

export const VERSION = "0.1.0";
