import { ClientSDKError, type ClientSDKErrorOptions } from "./ClientSDKError.js"
import { ERROR_CODES } from "./errors-codes.js"
import type { PagerState } from "../pagination/types.js"

interface PagerStateErrorOptions extends ClientSDKErrorOptions {
  state: PagerState
}

/**
 * A pager was advanced while a page fetch was in flight, or after a fetch
 * failed.
 */
export class PagerStateError extends ClientSDKError {
  name = "PagerStateError" as const
  code = ERROR_CODES.PagerStateError

  /**
   * The state the pager was in when it refused to advance.
   */
  state: PagerState

  constructor(message: string, options: PagerStateErrorOptions) {
    super(message, options)
    this.state = options.state
  }
}
