import { BaseError } from "@pricecache/errors"

export class ConfigValidationError extends BaseError<"config_invalid"> {
  constructor(details: string, sources: readonly string[]) {
    super(`Configuration validation failed:\n${details}`, {
      code: "config_invalid",
      context: { sources },
      isOperational: false,
    })
  }
}
