import { ClientSDKError, type ClientSDKErrorOptions } from "./ClientSDKError.js"
import { ERROR_CODES } from "./errors-codes.js"

/**
 * A client method was called with arguments that cannot be combined, such as a
 * request object together with flattened fields.
 */
export class InvalidArgumentError extends ClientSDKError {
  name = "InvalidArgumentError" as const
  code = ERROR_CODES.InvalidArgumentError

  constructor(message: string, options?: ClientSDKErrorOptions) {
    super(message, options)
  }
}
