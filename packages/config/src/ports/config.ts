/**
 * Validated configuration with provenance.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: envSchema,
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 *   aliases: { STORAGE_ROOT: ["BASE_DIR"] },
 * })
 *
 * config.value.STORAGE_ROOT      // "./storage"
 * config.explain("STORAGE_ROOT") // "env (BASE_DIR)"
 * ```
 */
export interface IConfig<T> {
  readonly value: T

  /**
   * Which source supplied the final value of `key`: a source name, the
   * source name plus the alias that was read, or `"default"`.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of the sources that supplied at least one final value. */
  sourcesUsed(): string[]

  /**
   * Keys supplied by a source that neither the schema nor an alias knows.
   */
  unknownKeys(): string[]
}
