import { ClientSDKError, type ClientSDKErrorOptions } from "./ClientSDKError.js"
import { ERROR_CODES } from "./errors-codes.js"

/**
 * Credentials were given more than one way.
 */
export class DuplicateCredentialArgsError extends ClientSDKError {
  name = "DuplicateCredentialArgsError" as const
  code = ERROR_CODES.DuplicateCredentialArgsError

  constructor(message: string, options?: ClientSDKErrorOptions) {
    super(message, options)
  }
}
