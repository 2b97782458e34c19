import JSBI from "jsbi";
import { expect } from "chai";
import { PoolKey, SettlementAuthority, TransferAgent } from "../src/hook/types";
import { SingleSidedLiquidityHook } from "../src/hook/single-sided-hook";

export const POOL_MANAGER = "0x1000000000000000000000000000000000000001";
export const HOOK = "0x2000000000000000000000000000000000000002";
export const TOKEN_A = "0x3000000000000000000000000000000000000003";
export const TOKEN_B = "0x4000000000000000000000000000000000000004";
export const ALICE = "0x000000000000000000000000000000000000a11c";
export const BOB = "0x0000000000000000000000000000000000000b0b";
export const CAROL = "0x00000000000000000000000000000000000ca201";
export const STRANGER = "0x5000000000000000000000000000000000000005";

export const big = (x: number | string) => JSBI.BigInt(x);

export const POOL_KEY: PoolKey = {
  currencyA: TOKEN_A,
  currencyB: TOKEN_B,
  fee: 3000,
  tickSpacing: 60,
  hooks: HOOK,
};

/** Resolve with the rejection message of `promise`, failing if it fulfils */
export async function rejectionOf(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
  throw new Error("Expected the operation to fail");
}

export async function expectRevert(promise: Promise<unknown>, code: string): Promise<void> {
  expect(await rejectionOf(promise)).to.equal(code);
}

export interface SettlementCall {
  kind: "settle" | "take";
  currency: string;
  amount: string;
}

/** Settlement authority that records calls and can be told to throw */
export class FakeSettlement implements SettlementAuthority {
  calls: SettlementCall[] = [];
  failWith?: string;

  async settle(currency: string, amount: JSBI): Promise<void> {
    if (this.failWith) throw new Error(this.failWith);
    this.calls.push({ kind: "settle", currency, amount: amount.toString() });
  }

  async take(currency: string, amount: JSBI): Promise<void> {
    if (this.failWith) throw new Error(this.failWith);
    this.calls.push({ kind: "take", currency, amount: amount.toString() });
  }
}

/** Transfer agent that approves every transfer unless `reject` is set */
export class FakeTransfers implements TransferAgent {
  ins: string[] = [];
  outs: string[] = [];
  reject = false;

  async transferIn(currency: string, from: string, amount: JSBI): Promise<boolean> {
    if (this.reject) return false;
    this.ins.push(`${currency}:${from}:${amount.toString()}`);
    return true;
  }

  async transferOut(currency: string, to: string, amount: JSBI): Promise<boolean> {
    if (this.reject) return false;
    this.outs.push(`${currency}:${to}:${amount.toString()}`);
    return true;
  }
}

export interface HookFixture {
  hook: SingleSidedLiquidityHook;
  settlement: FakeSettlement;
  transfers: FakeTransfers;
}

export async function boundHook(): Promise<HookFixture> {
  const settlement = new FakeSettlement();
  const transfers = new FakeTransfers();
  const hook = new SingleSidedLiquidityHook({
    address: HOOK,
    poolManager: POOL_MANAGER,
    settlement,
    transfers,
    checkInvariants: true,
  });
  await hook.bindPool(POOL_MANAGER, POOL_KEY);
  return { hook, settlement, transfers };
}
