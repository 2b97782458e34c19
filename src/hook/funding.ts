import { Asset } from "../enums";
import { ZERO, add, gt, lt, lte, sub } from "../utils";
import { HookErrorCode } from "./errors";
import { PoolLedgerState } from "./ledger-state";
import { Big } from "./types";

/** Credit a depositor and grow the unmatched surplus of `asset` */
export function applyFund(state: PoolLedgerState, depositor: string, asset: Asset, amount: Big): void {
  if (!gt(amount, ZERO)) throw new Error(HookErrorCode.ZERO_AMOUNT);

  state.setBalance(depositor, asset, add(state.balanceOf(depositor, asset), amount));
  state.reservoir[asset] = sub(state.reservoir[asset], amount);
  state.funded[asset] = add(state.funded[asset], amount);
}

/**
 * Debit a depositor and shrink the unmatched surplus. Only surplus that is not
 * fronted to any position can leave: amount + reservoir must stay <= 0.
 */
export function applyDefund(state: PoolLedgerState, depositor: string, asset: Asset, amount: Big): void {
  if (!gt(amount, ZERO)) throw new Error(HookErrorCode.ZERO_AMOUNT);

  const balance = state.balanceOf(depositor, asset);
  if (lt(balance, amount)) throw new Error(HookErrorCode.INSUFFICIENT_BALANCE);
  if (!lte(add(amount, state.reservoir[asset]), ZERO)) {
    throw new Error(HookErrorCode.INSUFFICIENT_UNMATCHED_LIQUIDITY);
  }

  state.setBalance(depositor, asset, sub(balance, amount));
  state.reservoir[asset] = add(state.reservoir[asset], amount);
  state.funded[asset] = sub(state.funded[asset], amount);
}
