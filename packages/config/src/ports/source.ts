/**
 * A source of raw configuration values.
 *
 * Sources only load. Validation, coercion and defaults belong to the schema
 * passed to `loadConfig`. Sources are applied in order and later sources
 * override earlier ones.
 */
export interface ConfigSource {
  /**
   * Provenance label, e.g. "env", "dotenv:.env" or "object:mail".
   */
  readonly name: string

  /**
   * A key mapped to `undefined` counts as not provided.
   */
  load(): Promise<Record<string, unknown>>
}
