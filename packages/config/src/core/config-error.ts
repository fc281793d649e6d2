import { BaseError } from "@bucketfs/errors"

export type ConfigIssue = { path: string; message: string }

export class ConfigError extends BaseError<"config_invalid"> {
  static invalid(pretty: string, issues: ConfigIssue[]): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${pretty}`, {
      code: "config_invalid",
      context: { issues },
      isOperational: false,
    })
  }
}
