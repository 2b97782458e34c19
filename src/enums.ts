export enum Asset {
  A = "A",
  B = "B",
}

export enum HookEvent {
  POOL_BOUND = "PoolBound",
  FUNDED = "Funded",
  DEFUNDED = "Defunded",
  MATCHED = "Matched",
  UNWOUND = "Unwound",
}

