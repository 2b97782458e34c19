import { Asset } from "../enums";
import { ZERO, add, gte, lte, sub } from "../utils";
import { PoolLedgerState } from "./ledger-state";
import { PositionKey } from "./position-key";
import { BalanceDelta, Big } from "./types";

export interface MatchResult {
  asset: Asset;
  need: Big;       // the contribution's delta in `asset` (negative when the position requires it)
  fronted: Big;    // <= 0, drawn from the reservoir
  shortfall: Big;  // need - fronted; left to the caller's own settlement
  partial: boolean;
  delta: BalanceDelta;
}

export function deltaFor(asset: Asset, amount: Big): BalanceDelta {
  return asset === Asset.A ? { amountA: amount, amountB: ZERO } : { amountA: ZERO, amountB: amount };
}

/**
 * Cover a single-sided contribution's requirement of `asset` from the reservoir.
 *
 * Full match when the reservoir holds at least |need| of surplus, otherwise the
 * whole surplus is fronted and the reservoir drops to zero. The uncovered part
 * of a partial match is reported as `shortfall` and tracked nowhere else.
 */
export function matchContribution(
  state: PoolLedgerState,
  position: PositionKey,
  asset: Asset,
  need: Big
): MatchResult {
  // nothing of `asset` is required
  if (gte(need, ZERO)) {
    return { asset, need, fronted: ZERO, shortfall: ZERO, partial: false, delta: deltaFor(asset, ZERO) };
  }

  const reservoir = state.reservoir[asset];
  let fronted: Big;
  let partial: boolean;
  if (lte(reservoir, need)) {
    fronted = need;
    partial = false;
    state.reservoir[asset] = sub(reservoir, need);
  } else {
    fronted = reservoir;
    partial = true;
    state.reservoir[asset] = ZERO;
  }

  state.setDebt(position, asset, add(state.debtOf(position, asset), fronted));

  return {
    asset,
    need,
    fronted,
    shortfall: sub(need, fronted),
    partial,
    delta: deltaFor(asset, fronted),
  };
}
