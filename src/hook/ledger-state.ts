import { Asset } from "../enums";
import { ZERO, add, ensure, eq, gt, lte, gte } from "../utils";
import { HookErrorCode } from "./errors";
import { PositionKey } from "./position-key";
import { Big, TwoSided } from "./types";

export const ASSETS: readonly Asset[] = [Asset.A, Asset.B];

const zeroPair = (): TwoSided<Big> => ({ [Asset.A]: ZERO, [Asset.B]: ZERO });
const copyPair = (p: TwoSided<Big>): TwoSided<Big> => ({ [Asset.A]: p[Asset.A], [Asset.B]: p[Asset.B] });

export interface PoolLedgerSnapshot {
  poolId: string;
  reservoir: TwoSided<string>;
  funded: TwoSided<string>;
  balances: Record<string, TwoSided<string>>;
  positionDebt: Record<string, TwoSided<string>>;
}

/**
 * Everything the hook knows about one pool.
 *
 * `reservoir` is negative while the hook holds unmatched surplus of an asset.
 * `funded` is the net amount depositors put in (fund minus defund), the
 * quantity that reservoir plus all position debts must always add back to.
 */
export class PoolLedgerState {
  reservoir: TwoSided<Big> = zeroPair();
  funded: TwoSided<Big> = zeroPair();
  private balances: Map<string, TwoSided<Big>> = new Map();
  // controller -> salt -> debt
  private debts: Map<string, Map<string, TwoSided<Big>>> = new Map();

  constructor(readonly poolId: string) {}

  /** ---------- Depositor balances ---------- */
  balanceOf(depositor: string, asset: Asset): Big {
    return this.balances.get(depositor)?.[asset] ?? ZERO;
  }

  setBalance(depositor: string, asset: Asset, value: Big): void {
    const entry = this.balances.get(depositor) ?? zeroPair();
    entry[asset] = value;
    this.balances.set(depositor, entry);
  }

  /** ---------- Position debt ---------- */
  debtOf(position: PositionKey, asset: Asset): Big {
    return this.debts.get(position.controller)?.get(position.salt)?.[asset] ?? ZERO;
  }

  setDebt(position: PositionKey, asset: Asset, value: Big): void {
    let bySalt = this.debts.get(position.controller);
    if (!bySalt) {
      bySalt = new Map();
      this.debts.set(position.controller, bySalt);
    }
    const entry = bySalt.get(position.salt) ?? zeroPair();
    entry[asset] = value;
    bySalt.set(position.salt, entry);
  }

  *positions(): IterableIterator<[PositionKey, TwoSided<Big>]> {
    for (const [controller, bySalt] of this.debts) {
      for (const [salt, debt] of bySalt) {
        yield [PositionKey.from(controller, salt), debt];
      }
    }
  }

  totalDebt(asset: Asset): Big {
    let total = ZERO;
    for (const bySalt of this.debts.values()) {
      for (const debt of bySalt.values()) total = add(total, debt[asset]);
    }
    return total;
  }

  totalBalances(asset: Asset): Big {
    let total = ZERO;
    for (const balance of this.balances.values()) total = add(total, balance[asset]);
    return total;
  }

  /** Deep copy used as the working draft of an operation */
  clone(): PoolLedgerState {
    const copy = new PoolLedgerState(this.poolId);
    copy.reservoir = copyPair(this.reservoir);
    copy.funded = copyPair(this.funded);
    for (const [depositor, balance] of this.balances) copy.balances.set(depositor, copyPair(balance));
    for (const [controller, bySalt] of this.debts) {
      const saltCopy = new Map<string, TwoSided<Big>>();
      for (const [salt, debt] of bySalt) saltCopy.set(salt, copyPair(debt));
      copy.debts.set(controller, saltCopy);
    }
    return copy;
  }

  /**
   * Conservation: reservoir + sum(debt) + funded == 0 and sum(balances) == funded,
   * per asset; reservoir and debts never positive, balances never negative.
   */
  verifyInvariants(): void {
    for (const asset of ASSETS) {
      const reservoir = this.reservoir[asset];
      const debt = this.totalDebt(asset);
      const funded = this.funded[asset];
      ensure(eq(add(add(reservoir, debt), funded), ZERO), HookErrorCode.INVARIANT_VIOLATED, {
        check: "reservoir + debt + funded == 0",
        poolId: this.poolId,
        asset,
        reservoir,
        debt,
        funded,
      });
      ensure(eq(this.totalBalances(asset), funded), HookErrorCode.INVARIANT_VIOLATED, {
        check: "sum(balances) == funded",
        poolId: this.poolId,
        asset,
        balances: this.totalBalances(asset),
        funded,
      });
      ensure(lte(reservoir, ZERO), HookErrorCode.INVARIANT_VIOLATED, {
        check: "reservoir <= 0",
        poolId: this.poolId,
        asset,
        reservoir,
      });
    }
    for (const [depositor, balance] of this.balances) {
      for (const asset of ASSETS) {
        ensure(gte(balance[asset], ZERO), HookErrorCode.INVARIANT_VIOLATED, {
          check: "balance >= 0",
          depositor,
          asset,
          balance: balance[asset],
        });
      }
    }
    for (const [position, debt] of this.positions()) {
      for (const asset of ASSETS) {
        ensure(!gt(debt[asset], ZERO), HookErrorCode.INVARIANT_VIOLATED, {
          check: "debt <= 0",
          position: position.toString(),
          asset,
          debt: debt[asset],
        });
      }
    }
  }

  snapshot(): PoolLedgerSnapshot {
    const str = (p: TwoSided<Big>): TwoSided<string> => ({
      [Asset.A]: p[Asset.A].toString(),
      [Asset.B]: p[Asset.B].toString(),
    });
    const balances: Record<string, TwoSided<string>> = {};
    for (const [depositor, balance] of this.balances) balances[depositor] = str(balance);
    const positionDebt: Record<string, TwoSided<string>> = {};
    for (const [position, debt] of this.positions()) positionDebt[position.toString()] = str(debt);
    return {
      poolId: this.poolId,
      reservoir: str(this.reservoir),
      funded: str(this.funded),
      balances,
      positionDebt,
    };
  }
}

