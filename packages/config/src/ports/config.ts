/**
 * Validated configuration with provenance.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({
 *     FREESEND_API_KEY: z.optional(z.string()),
 *     FREESEND_ENDPOINT: z._default(z.string(), "https://mail.example.com/send"),
 *   }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.value.FREESEND_ENDPOINT      // "https://mail.example.com/send"
 * config.explain("FREESEND_ENDPOINT") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /**
   * Name of the source that supplied the final value for `key`, or
   * `"default"` when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string
}
