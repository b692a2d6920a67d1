export const ERROR_CODES = {
  /**
   * {@link InvalidConfigurationError}
   */
  InvalidConfigurationError: "E_INVALID_CONFIGURATION",

  /**
   * {@link MutualTLSChannelError}
   */
  MutualTLSChannelError: "E_MTLS_CHANNEL",

  /**
   * {@link DuplicateCredentialArgsError}
   */
  DuplicateCredentialArgsError: "E_DUPLICATE_CREDENTIAL_ARGS",

  /**
   * {@link InvalidArgumentError}
   */
  InvalidArgumentError: "E_INVALID_ARGUMENT",

  /**
   * {@link PagerStateError}
   */
  PagerStateError: "E_PAGER_STATE",

  /**
   * {@link PagerCancelledError}
   */
  PagerCancelledError: "E_PAGER_CANCELLED",
} as const

type ErrorCodesType = typeof ERROR_CODES
export type ErrorNames = keyof ErrorCodesType
export type ErrorCodes = ErrorCodesType[ErrorNames]
