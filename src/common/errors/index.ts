export { ClientSDKError } from "./ClientSDKError.js"
export type { ClientSDKErrorOptions } from "./ClientSDKError.js"
export { InvalidConfigurationError } from "./InvalidConfigurationError.js"
export { MutualTLSChannelError } from "./MutualTLSChannelError.js"
export { DuplicateCredentialArgsError } from "./DuplicateCredentialArgsError.js"
export { InvalidArgumentError } from "./InvalidArgumentError.js"
export { PagerStateError } from "./PagerStateError.js"
export { PagerCancelledError } from "./PagerCancelledError.js"
export { ERROR_CODES } from "./errors-codes.js"
export type { ErrorCodes, ErrorNames } from "./errors-codes.js"
