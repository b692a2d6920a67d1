import type { ErrorCodes, ErrorNames } from "./errors-codes.js"

export interface ClientSDKErrorOptions {
  cause?: unknown
}

/**
 * The base error. Every error thrown by the library itself extends this class.
 * Errors returned by the server (gRPC `ServiceError`) are passed through as is.
 */
export abstract class ClientSDKError extends Error {
  /**
   * The name of the error.
   */
  abstract readonly name: ErrorNames

  /**
   * The error code.
   */
  abstract readonly code: ErrorCodes

  protected constructor(message: string, options?: ClientSDKErrorOptions) {
    super(message, { cause: options?.cause })
  }

  get [Symbol.toStringTag]() {
    return this.name
  }
}
