import { ClientSDKError, type ClientSDKErrorOptions } from "./ClientSDKError.js"
import { ERROR_CODES } from "./errors-codes.js"

/**
 * The mutual TLS endpoint or channel could not be set up.
 */
export class MutualTLSChannelError extends ClientSDKError {
  name = "MutualTLSChannelError" as const
  code = ERROR_CODES.MutualTLSChannelError

  constructor(message: string, options?: ClientSDKErrorOptions) {
    super(message, options)
  }
}
