import { BaseError } from "@picfetch/errors"

export class ConfigError extends BaseError<"invalid_config"> {
  static invalid(details: string, cause?: unknown): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${details}`, {
      code: "invalid_config",
      cause,
      isOperational: false,
    })
  }
}
