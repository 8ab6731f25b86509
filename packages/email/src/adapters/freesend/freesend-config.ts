import {
  type ConfigSource,
  ConfigError,
  DotenvSource,
  EnvSource,
  loadConfig,
} from "@mailport/config"
import { createNullLogger, type Logger } from "@mailport/logger"
import { z } from "zod"
import { FreesendError } from "./freesend-error"

export const DEFAULT_FREESEND_ENDPOINT = "https://freesend.metafog.io/api/send-email"

export const DEFAULT_FREESEND_TIMEOUT_MS = 30_000

export const freesendEnvSchema = z.object({
  FREESEND_API_KEY: z.string().optional(),
  FREESEND_ENDPOINT: z.string().default(DEFAULT_FREESEND_ENDPOINT),
})

/**
 * Package-level settings shared by every Freesend mailer.
 */
export type FreesendPackageConfig = {
  apiKey?: string
  endpoint?: string
}

export type LoadFreesendConfigOptions = {
  /** @default [.env (optional), process.env] */
  sources?: ConfigSource[]
  cwd?: string
  logger?: Logger
}

export async function loadFreesendConfig(
  options: LoadFreesendConfigOptions = {},
): Promise<FreesendPackageConfig> {
  const sources = options.sources ?? [
    new DotenvSource({ file: ".env", required: false, cwd: options.cwd }),
    new EnvSource(),
  ]

  const config = await loadConfig({ schema: freesendEnvSchema, sources })
  const logger = options.logger ?? createNullLogger()

  logger.debug("Loaded Freesend config", {
    endpoint: config.value.FREESEND_ENDPOINT,
    source: config.explain("FREESEND_ENDPOINT"),
  })

  return {
    ...(config.value.FREESEND_API_KEY !== undefined && {
      apiKey: config.value.FREESEND_API_KEY,
    }),
    endpoint: config.value.FREESEND_ENDPOINT,
  }
}

/**
 * Per-mailer options, as found under `mailers.<name>` in the mail config.
 */
export const freesendMailerSchema = z.object({
  transport: z.literal("freesend"),
  key: z.string().optional(),
  endpoint: z.string().optional(),
  timeoutMs: z.number().int().positive().optional(),
})

export type FreesendMailerConfig = z.infer<typeof freesendMailerSchema>

export type FreesendTransportOptions = {
  apiKey: string
  endpoint: string
  timeoutMs: number
}

export function parseFreesendMailerConfig(mailer: string, raw: unknown): FreesendMailerConfig {
  const result = freesendMailerSchema.safeParse(raw)

  if (!result.success) {
    throw ConfigError.validationFailed(result.error, [`mailers.${mailer}`])
  }

  return result.data
}

/**
 * Pick the first defined value from each ordered source list: the mailer's own
 * option, then the package config. An empty string counts as defined and fails.
 *
 * @throws {FreesendError} `missing_api_key` or `missing_endpoint`
 */
export function resolveFreesendOptions(
  mailer: string,
  mailerConfig: FreesendMailerConfig,
  packageConfig: FreesendPackageConfig,
): FreesendTransportOptions {
  const apiKey = firstDefined(mailerConfig.key, packageConfig.apiKey)
  const endpoint = firstDefined(mailerConfig.endpoint, packageConfig.endpoint)

  if (!apiKey) throw FreesendError.missingApiKey(mailer)
  if (!endpoint) throw FreesendError.missingEndpoint(mailer)

  return {
    apiKey,
    endpoint,
    timeoutMs: mailerConfig.timeoutMs ?? DEFAULT_FREESEND_TIMEOUT_MS,
  }
}

function firstDefined(...values: (string | undefined)[]): string | undefined {
  return values.find((v) => v !== undefined)
}
