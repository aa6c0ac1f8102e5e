/**
 * Validated configuration with provenance.
 *
 * @typeParam T - Shape of the configuration, inferred from the zod schema.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({
 *     PRICE_CACHE_MAX_AGE_MS: z._default(z.coerce.number(), 60_000),
 *   }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("PRICE_CACHE_MAX_AGE_MS")     // 60000
 * config.explain("PRICE_CACHE_MAX_AGE_MS") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object (frozen) */
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Name of the source that provided the final value for `key`
   * (e.g. "env", "dotenv:.env"), or "default" for schema defaults.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct source names that contributed at least one value. */
  sourcesUsed(): string[]

  /**
   * Keys present in sources but not defined in the schema.
   *
   * Useful for spotting typos such as `PRICE_CACHE_MAXAGE_MS`.
   */
  unknownKeys(): string[]
}
