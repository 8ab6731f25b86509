import { BaseError } from "@mailport/errors"
import { type ZodError, z } from "zod"

export type ConfigErrorCode = "invalid_config"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static validationFailed(error: ZodError, sources: string[]): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${z.prettifyError(error)}`, {
      code: "invalid_config",
      context: {
        keys: error.issues.map((issue) => issue.path.map(String).join(".")),
        sources,
      },
      isOperational: false,
    })
  }
}
