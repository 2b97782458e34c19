export { Asset, HookEvent } from "./enums";
export { HookErrorCode } from "./hook/errors";
export { SingleSidedLiquidityHook, poolManagerOnly } from "./hook/single-sided-hook";
export type {
  HookParams,
  HookEvents,
  PoolBoundEvent,
  FundingEvent,
  MatchedEvent,
  UnwoundEvent,
} from "./hook/single-sided-hook";
export { PoolLedgerState } from "./hook/ledger-state";
export type { PoolLedgerSnapshot } from "./hook/ledger-state";
export { applyFund, applyDefund } from "./hook/funding";
export { matchContribution } from "./hook/matching";
export type { MatchResult } from "./hook/matching";
export { unwindPosition } from "./hook/unwind";
export type { UnwindResult } from "./hook/unwind";
export { decodeMatchInstruction, encodeMatchInstruction, NO_MATCH } from "./hook/instruction";
export { PositionKey, normalizeAddress, normalizeSalt, toPoolId, validatePoolKey, currencyOf } from "./hook/position-key";
export { SerialQueue } from "./hook/serial-queue";
export * from "./hook/types";
export { InMemoryTokenLedger } from "./account";
export { buildDryRunPoolManager } from "./engine";
export type { PoolManager, ModifyLiquidityResult } from "./engine";
export { buildSimulation } from "./simulation";
export type { Simulation } from "./simulation";
export { LedgerLogDBManager, collectLedgerLogs } from "./ledger-log";
export type { LedgerLog } from "./ledger-log";
export {
  PoolConfigManager,
  USDC_WETH_CONFIG,
  WBTC_USDT_CONFIG,
  createPoolConfig,
  getCurrentPoolConfig,
  setCurrentPoolConfig,
} from "./pool-config";
export type { PoolConfig, TokenConfig } from "./pool-config";
