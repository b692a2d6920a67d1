import { ClientSDKError, type ClientSDKErrorOptions } from "./ClientSDKError.js"
import { ERROR_CODES } from "./errors-codes.js"

/**
 * Client options, a credentials file or an environment variable holds a value
 * the client cannot use.
 */
export class InvalidConfigurationError extends ClientSDKError {
  name = "InvalidConfigurationError" as const
  code = ERROR_CODES.InvalidConfigurationError

  constructor(message: string, options?: ClientSDKErrorOptions) {
    super(message, options)
  }
}
