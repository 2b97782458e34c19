import JSBI from "jsbi";
import { BytesLike } from "ethers";
import { Asset } from "../enums";

export type Big = JSBI;

export type TwoSided<T> = Record<Asset, T>;

/** Identifies a pool; currencyA < currencyB by address value */
export interface PoolKey {
  currencyA: string;
  currencyB: string;
  fee: number;         // uint24
  tickSpacing: number; // int24
  hooks: string;
}

/** Signed amounts from the caller's point of view: negative = owed to the pool manager */
export interface BalanceDelta {
  amountA: Big;
  amountB: Big;
}

export type Salt = BytesLike | number | bigint;

export interface ModifyLiquidityParams {
  tickLower: number;
  tickUpper: number;
  liquidityDelta: Big;
  salt: Salt;
}

/** Decoded hook data of a liquidity notification */
export type MatchInstruction =
  | { kind: "none" }
  | { kind: "match"; asset: Asset };

/** The pool manager's balance-accounting surface, bound to the hook's account */
export interface SettlementAuthority {
  settle(currency: string, amount: Big): Promise<void>;
  take(currency: string, amount: Big): Promise<void>;
}

/** Moves tokens between a depositor and the hook's custody; `false` means the transfer was rejected */
export interface TransferAgent {
  transferIn(currency: string, from: string, amount: Big): Promise<boolean>;
  transferOut(currency: string, to: string, amount: Big): Promise<boolean>;
}

export interface Authorizer {
  canCallHook(msgSender: string): boolean;
}

/**
 * Run by the hook after its settlement calls and before it commits, with the
 * delta it is about to return. A throw aborts the callback with nothing committed.
 */
export type CommitCheck = (hookDelta: BalanceDelta) => void | Promise<void>;

/** The callbacks a pool manager drives on a hook */
export interface LiquidityHooks {
  readonly address: string;
  bindPool(msgSender: string, key: PoolKey): Promise<string>;
  afterAddLiquidity(
    msgSender: string,
    sender: string,
    key: PoolKey,
    params: ModifyLiquidityParams,
    delta: BalanceDelta,
    hookData: BytesLike,
    beforeCommit?: CommitCheck
  ): Promise<BalanceDelta>;
  afterRemoveLiquidity(
    msgSender: string,
    sender: string,
    key: PoolKey,
    params: ModifyLiquidityParams,
    delta: BalanceDelta,
    hookData: BytesLike,
    beforeCommit?: CommitCheck
  ): Promise<BalanceDelta>;
}

export { JSBI };
