// Error messages thrown by the hook and the dry-run pool manager
export const HookErrorCode = {
  ZERO_AMOUNT: "SSLH_ZeroAmount",
  INSUFFICIENT_BALANCE: "SSLH_InsufficientBalance",
  INSUFFICIENT_UNMATCHED_LIQUIDITY: "SSLH_InsufficientUnmatchedLiquidity",
  INVALID_ASSET_SELECTION: "SSLH_InvalidAssetSelection",
  TRANSFER_FAILED: "SSLH_TransferFailed",
  UNAUTHORIZED: "SSLH_Unauthorized",
  INVALID_ADDRESS: "SSLH_InvalidAddress",
  INVALID_SALT: "SSLH_InvalidSalt",
  CURRENCIES_OUT_OF_ORDER: "SSLH_CurrenciesOutOfOrder",
  POOL_NOT_BOUND: "SSLH_PoolNotBound",
  POOL_ALREADY_BOUND: "SSLH_PoolAlreadyBound",
  INVARIANT_VIOLATED: "SSLH_InvariantViolated",
  CURRENCY_NOT_SETTLED: "SSLH_CurrencyNotSettled",
  UNKNOWN_HOOK: "SSLH_UnknownHook",
  HOOK_MISMATCH: "SSLH_HookMismatch",
  POOL_NOT_INITIALIZED: "SSLH_PoolNotInitialized",
  UNSUPPORTED_FEE: "SSLH_UnsupportedFee",
  ZERO_LIQUIDITY: "SSLH_ZeroLiquidity",
} as const;

export type HookErrorCode = (typeof HookErrorCode)[keyof typeof HookErrorCode];
