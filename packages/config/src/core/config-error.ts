import { BaseError } from "@randwire/errors"

export type ConfigErrorCode = "invalid_config"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static invalid(details: string, issues: readonly { path: string; message: string }[]) {
    return new ConfigError(`Configuration validation failed:\n${details}`, {
      code: "invalid_config",
      context: { issues },
      isOperational: false,
    })
  }
}
