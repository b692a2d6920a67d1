import { ClientSDKError, type ClientSDKErrorOptions } from "./ClientSDKError.js"
import { ERROR_CODES } from "./errors-codes.js"

/**
 * The abort signal of a pager fired while a page fetch was pending.
 * `cause` holds the abort reason.
 */
export class PagerCancelledError extends ClientSDKError {
  name = "PagerCancelledError" as const
  code = ERROR_CODES.PagerCancelledError

  constructor(message: string, options?: ClientSDKErrorOptions) {
    super(message, options)
  }
}
