// Only mutable methods (besides pool binding): fund, defund and the two liquidity callbacks.
// No fee accrual. No tick or range logic; the pool manager reports deltas and the hook trusts them.

import { EventEmitter } from "events";
import { BytesLike } from "ethers";
import { DEBUG_LEDGER, hookConfig } from "../../config";
import { Asset, HookEvent } from "../enums";
import { ZERO, fmtUTC, isNegative, isPositive, neg } from "../utils";
import { HookErrorCode } from "./errors";
import { applyDefund, applyFund } from "./funding";
import { decodeMatchInstruction } from "./instruction";
import { ASSETS, PoolLedgerSnapshot, PoolLedgerState } from "./ledger-state";
import { matchContribution } from "./matching";
import { PositionKey, currencyOf, normalizeAddress, toPoolId, validatePoolKey } from "./position-key";
import { SerialQueue } from "./serial-queue";
import {
  Authorizer,
  BalanceDelta,
  Big,
  CommitCheck,
  LiquidityHooks,
  ModifyLiquidityParams,
  PoolKey,
  Salt,
  SettlementAuthority,
  TransferAgent,
} from "./types";
import { UnwindResult, unwindPosition } from "./unwind";

/** ---------- Events ---------- */

export interface PoolBoundEvent {
  poolId: string;
  key: PoolKey;
  timestamp: string;
}

export interface FundingEvent {
  poolId: string;
  depositor: string;
  asset: Asset;
  amount: Big;
  balance: Big;   // depositor balance after the operation
  reservoir: Big; // reservoir after the operation
  timestamp: string;
}

export interface MatchedEvent {
  poolId: string;
  position: string;
  asset: Asset;
  need: Big;
  fronted: Big;
  shortfall: Big;
  partial: boolean;
  debt: Big;
  reservoir: Big;
  timestamp: string;
}

export interface UnwoundEvent {
  poolId: string;
  position: string;
  asset: Asset;
  amount: Big;
  reclaimed: Big;
  debt: Big;
  reservoir: Big;
  timestamp: string;
}

export interface HookEvents {
  [HookEvent.POOL_BOUND]: PoolBoundEvent;
  [HookEvent.FUNDED]: FundingEvent;
  [HookEvent.DEFUNDED]: FundingEvent;
  [HookEvent.MATCHED]: MatchedEvent;
  [HookEvent.UNWOUND]: UnwoundEvent;
}

type PendingEvent = { [E in HookEvent]: { name: E; payload: HookEvents[E] } }[HookEvent];

/** Ledger mutations already applied to a draft, plus the external calls that must succeed before commit */
interface Plan<T> {
  value: T;
  events: PendingEvent[];
  external?: () => Promise<void>;
}

export interface HookParams {
  settlement: SettlementAuthority;
  transfers: TransferAgent;
  address?: string;
  poolManager?: string;
  authorizer?: Authorizer;
  checkInvariants?: boolean;
}

export function poolManagerOnly(poolManager: string): Authorizer {
  const expected = normalizeAddress(poolManager).toLowerCase();
  return {
    canCallHook: (msgSender: string) => msgSender.toLowerCase() === expected,
  };
}

const zeroDelta = (): BalanceDelta => ({ amountA: ZERO, amountB: ZERO });

/** ---------- Hook ---------- */

export class SingleSidedLiquidityHook implements LiquidityHooks {
  readonly address: string;
  readonly poolManager: string;

  private pools: Map<string, PoolLedgerState> = new Map();
  private queues: Map<string, SerialQueue> = new Map();
  private settlement: SettlementAuthority;
  private transfers: TransferAgent;
  private authorizer: Authorizer;
  private checkInvariants: boolean;
  private emitter = new EventEmitter();

  constructor(params: HookParams) {
    this.address = normalizeAddress(params.address ?? hookConfig.hookAddress);
    this.poolManager = normalizeAddress(params.poolManager ?? hookConfig.poolManagerAddress);
    this.settlement = params.settlement;
    this.transfers = params.transfers;
    this.authorizer = params.authorizer ?? poolManagerOnly(this.poolManager);
    this.checkInvariants = params.checkInvariants ?? hookConfig.checkInvariants;
  }

  on<E extends HookEvent>(event: E, listener: (payload: HookEvents[E]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<E extends HookEvent>(event: E, listener: (payload: HookEvents[E]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  /** ---------- Getters ---------- */
  isBound(key: PoolKey): boolean {
    return this.pools.has(toPoolId(key));
  }

  balanceOf(key: PoolKey, depositor: string, asset: Asset): Big {
    return this._state(key).balanceOf(normalizeAddress(depositor), asset);
  }

  reservoirOf(key: PoolKey, asset: Asset): Big {
    return this._state(key).reservoir[asset];
  }

  /** Surplus still available for matching or defunding */
  unmatchedLiquidity(key: PoolKey, asset: Asset): Big {
    const reservoir = this.reservoirOf(key, asset);
    return isNegative(reservoir) ? neg(reservoir) : ZERO;
  }

  positionDebtOf(key: PoolKey, controller: string, salt: Salt, asset: Asset): Big {
    return this._state(key).debtOf(PositionKey.from(controller, salt), asset);
  }

  snapshot(key: PoolKey): PoolLedgerSnapshot {
    return this._state(key).snapshot();
  }

  verifyInvariants(key: PoolKey): void {
    this._state(key).verifyInvariants();
  }

  /** ---------- Pool binding ---------- */

  /** Called by the pool manager before a pool that uses this hook is initialized */
  async bindPool(msgSender: string, key: PoolKey): Promise<string> {
    this._authorize(msgSender);
    const poolKey = validatePoolKey(key);
    if (poolKey.hooks !== this.address) throw new Error(HookErrorCode.HOOK_MISMATCH);

    const poolId = toPoolId(poolKey);
    if (this.pools.has(poolId)) throw new Error(HookErrorCode.POOL_ALREADY_BOUND);
    this.pools.set(poolId, new PoolLedgerState(poolId));
    this.queues.set(poolId, new SerialQueue());

    console.log(`[BIND] Pool ${poolId} (${poolKey.currencyA} / ${poolKey.currencyB}, fee ${poolKey.fee})`);
    this._emit({ name: HookEvent.POOL_BOUND, payload: { poolId, key: poolKey, timestamp: fmtUTC(new Date()) } });
    return poolId;
  }

  /** ---------- Mutations ---------- */

  /** Deposit `amount` of `asset` into the reservoir and credit it to `depositor` */
  async fund(depositor: string, key: PoolKey, asset: Asset, amount: Big): Promise<void> {
    const who = normalizeAddress(depositor);
    await this._atomically(key, "fund", (draft, poolKey) => {
      applyFund(draft, who, asset, amount);
      if (DEBUG_LEDGER) {
        console.log(`[FUND] ${who} +${amount.toString()} ${asset}, reservoir ${draft.reservoir[asset].toString()}`);
      }
      return {
        value: undefined,
        events: [{ name: HookEvent.FUNDED, payload: this._fundingPayload(draft, who, asset, amount) }],
        external: async () => {
          const ok = await this.transfers.transferIn(currencyOf(poolKey, asset), who, amount);
          if (!ok) throw new Error(HookErrorCode.TRANSFER_FAILED);
        },
      };
    });
  }

  /** Return `amount` of `asset` to `depositor` out of the unmatched surplus */
  async defund(depositor: string, key: PoolKey, asset: Asset, amount: Big): Promise<void> {
    const who = normalizeAddress(depositor);
    await this._atomically(key, "defund", (draft, poolKey) => {
      applyDefund(draft, who, asset, amount);
      if (DEBUG_LEDGER) {
        console.log(`[DEFUND] ${who} -${amount.toString()} ${asset}, reservoir ${draft.reservoir[asset].toString()}`);
      }
      return {
        value: undefined,
        events: [{ name: HookEvent.DEFUNDED, payload: this._fundingPayload(draft, who, asset, amount) }],
        external: async () => {
          const ok = await this.transfers.transferOut(currencyOf(poolKey, asset), who, amount);
          if (!ok) throw new Error(HookErrorCode.TRANSFER_FAILED);
        },
      };
    });
  }

  /**
   * Match the single-sided contribution selected by `hookData` against the
   * reservoir. Returns the hook's delta: what it paid on the caller's behalf.
   */
  async afterAddLiquidity(
    msgSender: string,
    sender: string,
    key: PoolKey,
    params: ModifyLiquidityParams,
    delta: BalanceDelta,
    hookData: BytesLike,
    beforeCommit?: CommitCheck
  ): Promise<BalanceDelta> {
    this._authorize(msgSender);
    const instruction = decodeMatchInstruction(hookData);
    const position = PositionKey.from(sender, params.salt);
    if (instruction.kind === "none") {
      this._requireBound(key);
      const none = zeroDelta();
      if (beforeCommit) await beforeCommit(none);
      return none;
    }

    const asset = instruction.asset;
    return this._atomically(key, "match", (draft, poolKey) => {
      const need = asset === Asset.A ? delta.amountA : delta.amountB;
      const result = matchContribution(draft, position, asset, need);
      const debt = draft.debtOf(position, asset);
      const reservoir = draft.reservoir[asset];

      if (DEBUG_LEDGER || result.partial) {
        console.log(
          `[MATCH] ${position.toString()} ${asset}: need ${need.toString()}, fronted ${result.fronted.toString()}` +
            (result.partial ? `, shortfall ${result.shortfall.toString()} left to the caller` : "") +
            `, reservoir ${reservoir.toString()}`
        );
      }

      const events: PendingEvent[] = isNegative(need)
        ? [
            {
              name: HookEvent.MATCHED,
              payload: {
                poolId: draft.poolId,
                position: position.toString(),
                asset,
                need,
                fronted: result.fronted,
                shortfall: result.shortfall,
                partial: result.partial,
                debt,
                reservoir,
                timestamp: fmtUTC(new Date()),
              },
            },
          ]
        : [];

      return {
        value: result.delta,
        events,
        external: isNegative(result.fronted)
          ? () => this.settlement.settle(currencyOf(poolKey, asset), neg(result.fronted))
          : undefined,
      };
    }, beforeCommit);
  }

  /**
   * Reclaim fronted debt from what a reduced position returns. Driven by the
   * position's recorded debt; `hookData` must still be a valid instruction.
   */
  async afterRemoveLiquidity(
    msgSender: string,
    sender: string,
    key: PoolKey,
    params: ModifyLiquidityParams,
    delta: BalanceDelta,
    hookData: BytesLike,
    beforeCommit?: CommitCheck
  ): Promise<BalanceDelta> {
    this._authorize(msgSender);
    decodeMatchInstruction(hookData);
    const position = PositionKey.from(sender, params.salt);

    return this._atomically(key, "unwind", (draft, poolKey) => {
      const reclaimedBy: UnwindResult[] = [];
      const hookDelta = zeroDelta();

      for (const asset of ASSETS) {
        const amount = asset === Asset.A ? delta.amountA : delta.amountB;
        const result = unwindPosition(draft, position, asset, amount);
        if (!isPositive(result.reclaimed)) continue;
        reclaimedBy.push(result);
        if (asset === Asset.A) hookDelta.amountA = result.reclaimed;
        else hookDelta.amountB = result.reclaimed;

        if (DEBUG_LEDGER) {
          console.log(
            `[UNWIND] ${position.toString()} ${asset}: returned ${amount.toString()}, reclaimed ${result.reclaimed.toString()}, debt ${result.remainingDebt.toString()}`
          );
        }
      }

      return {
        value: hookDelta,
        events: reclaimedBy.map((r): PendingEvent => ({
          name: HookEvent.UNWOUND,
          payload: {
            poolId: draft.poolId,
            position: position.toString(),
            asset: r.asset,
            amount: r.amount,
            reclaimed: r.reclaimed,
            debt: r.remainingDebt,
            reservoir: draft.reservoir[r.asset],
            timestamp: fmtUTC(new Date()),
          },
        })),
        external: async () => {
          for (const r of reclaimedBy) {
            await this.settlement.take(currencyOf(poolKey, r.asset), r.reclaimed);
          }
        },
      };
    }, beforeCommit);
  }

  /** ---------- Internals ---------- */
  private _authorize(msgSender: string): void {
    if (!this.authorizer.canCallHook(msgSender)) throw new Error(HookErrorCode.UNAUTHORIZED);
  }

  private _requireBound(key: PoolKey): void {
    if (!this.pools.has(toPoolId(key))) throw new Error(HookErrorCode.POOL_NOT_BOUND);
  }

  private _state(key: PoolKey): PoolLedgerState {
    const state = this.pools.get(toPoolId(key));
    if (!state) throw new Error(HookErrorCode.POOL_NOT_BOUND);
    return state;
  }

  private _fundingPayload(draft: PoolLedgerState, depositor: string, asset: Asset, amount: Big): FundingEvent {
    return {
      poolId: draft.poolId,
      depositor,
      asset,
      amount,
      balance: draft.balanceOf(depositor, asset),
      reservoir: draft.reservoir[asset],
      timestamp: fmtUTC(new Date()),
    };
  }

  // Listeners see committed state only; one that throws is logged and the rest still run.
  private _emit(event: PendingEvent): void {
    for (const listener of this.emitter.listeners(event.name)) {
      try {
        listener(event.payload);
      } catch (err) {
        console.warn(`[EVENT] ${event.name} listener failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  /**
   * Two-phase apply under the pool's queue: mutate a draft copy, check it,
   * run the external calls and `beforeCommit`, then swap the draft in. Any
   * failure discards the draft, so the committed ledger is untouched.
   */
  private async _atomically<T>(
    key: PoolKey,
    label: string,
    mutate: (draft: PoolLedgerState, poolKey: PoolKey) => Plan<T>,
    beforeCommit?: (value: T) => void | Promise<void>
  ): Promise<T> {
    const poolKey = validatePoolKey(key);
    const poolId = toPoolId(poolKey);
    const queue = this.queues.get(poolId);
    if (!queue) throw new Error(HookErrorCode.POOL_NOT_BOUND);

    const plan = await queue.run(async () => {
      const draft = this._state(poolKey).clone();
      const applied = await this._apply(draft, poolKey, label, mutate, beforeCommit);
      this.pools.set(poolId, draft);
      return applied;
    });
    for (const event of plan.events) this._emit(event);
    return plan.value;
  }

  private async _apply<T>(
    draft: PoolLedgerState,
    poolKey: PoolKey,
    label: string,
    mutate: (draft: PoolLedgerState, poolKey: PoolKey) => Plan<T>,
    beforeCommit?: (value: T) => void | Promise<void>
  ): Promise<Plan<T>> {
    try {
      const plan = mutate(draft, poolKey);
      if (this.checkInvariants) draft.verifyInvariants();
      if (plan.external) await plan.external();
      if (beforeCommit) await beforeCommit(plan.value);
      return plan;
    } catch (err) {
      console.warn(`[ROLLBACK] ${label} on pool ${draft.poolId}: ${err instanceof Error ? err.message : String(err)}`);
      throw err;
    }
  }
}
