/**
 * Loads raw configuration values. No validation, coercion or merging happens
 * here; sources are applied in order and later ones win.
 */
export interface ConfigSource {
  /** Provenance label, e.g. `"env"` or `"dotenv:.env.production"`. */
  readonly name: string

  /**
   * Returns a fresh flat record. An `undefined` value means "not provided".
   */
  load(): Promise<Record<string, string | undefined>>
}
