import { Asset } from "../enums";
import { ZERO, add, gte, lte, neg, sub } from "../utils";
import { PoolLedgerState } from "./ledger-state";
import { deltaFor } from "./matching";
import { PositionKey } from "./position-key";
import { BalanceDelta, Big } from "./types";

export interface UnwindResult {
  asset: Asset;
  amount: Big;        // what the reduction returned in `asset`
  reclaimed: Big;     // 0 <= reclaimed <= amount
  remainingDebt: Big; // <= 0
  delta: BalanceDelta;
}

/**
 * Reclaim fronted debt out of an amount a reduced position returns.
 * The hook takes min(amount, |debt|); the rest stays with the caller.
 */
export function unwindPosition(
  state: PoolLedgerState,
  position: PositionKey,
  asset: Asset,
  amount: Big
): UnwindResult {
  const debt = state.debtOf(position, asset);
  if (lte(amount, ZERO) || gte(debt, ZERO)) {
    return { asset, amount, reclaimed: ZERO, remainingDebt: debt, delta: deltaFor(asset, ZERO) };
  }

  const residual = add(amount, debt);
  let reclaimed: Big;
  let remainingDebt: Big;
  if (gte(residual, ZERO)) {
    reclaimed = neg(debt);
    remainingDebt = ZERO;
  } else {
    reclaimed = amount;
    remainingDebt = residual;
  }

  state.setDebt(position, asset, remainingDebt);
  state.reservoir[asset] = sub(state.reservoir[asset], reclaimed);

  return { asset, amount, reclaimed, remainingDebt, delta: deltaFor(asset, reclaimed) };
}
