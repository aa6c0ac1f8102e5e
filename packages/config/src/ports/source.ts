/**
 * A source of raw configuration values.
 *
 * Sources only load. Validation and coercion happen in `loadConfig` through
 * the zod schema; sources are applied in order and later ones win.
 */
export interface ConfigSource {
  /**
   * Name used for provenance, e.g. "env" or "dotenv:.env.test".
   */
  readonly name: string

  /**
   * Load configuration values. `undefined` means "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
