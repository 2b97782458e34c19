import { Asset } from "./enums";
import { JSBI, PoolKey, TransferAgent } from "./hook/types";
import { currencyOf, normalizeAddress } from "./hook/position-key";
import { ZERO, add, gt, lt, sub } from "./utils";
import { getCurrentPoolConfig } from "./pool-config";

/**
 * Token balances per (currency, holder), standing in for the ERC20 contracts
 * of a simulated pool. Transfers never overdraw: they return false instead.
 */
export class InMemoryTokenLedger {
  // currency -> holder -> balance
  private balances: Map<string, Map<string, JSBI>> = new Map();

  balanceOf(currency: string, holder: string): JSBI {
    return this.balances.get(normalizeAddress(currency))?.get(normalizeAddress(holder)) ?? ZERO;
  }

  mint(currency: string, to: string, amount: JSBI): void {
    if (lt(amount, ZERO)) throw new Error("Cannot mint a negative amount");
    this._set(currency, to, add(this.balanceOf(currency, to), amount));
  }

  transfer(currency: string, from: string, to: string, amount: JSBI): boolean {
    if (lt(amount, ZERO)) return false;
    const fromBalance = this.balanceOf(currency, from);
    if (gt(amount, fromBalance)) return false;
    this._set(currency, from, sub(fromBalance, amount));
    this._set(currency, to, add(this.balanceOf(currency, to), amount));
    return true;
  }

  /** Sum of all holders' balances of `currency` */
  totalSupply(currency: string): JSBI {
    let total = ZERO;
    for (const balance of this.balances.get(normalizeAddress(currency))?.values() ?? []) {
      total = add(total, balance);
    }
    return total;
  }

  /** Transfer agent that moves tokens in and out of `custodian`'s balance */
  agentFor(holder: string): TransferAgent {
    const custodian = normalizeAddress(holder);
    return {
      transferIn: async (currency: string, from: string, amount: JSBI) => this.transfer(currency, from, custodian, amount),
      transferOut: async (currency: string, to: string, amount: JSBI) => this.transfer(currency, custodian, to, amount),
    };
  }

  private _set(currency: string, holder: string, amount: JSBI): void {
    const c = normalizeAddress(currency);
    let holders = this.balances.get(c);
    if (!holders) {
      holders = new Map();
      this.balances.set(c, holders);
    }
    holders.set(normalizeAddress(holder), amount);
  }
}

export function print(tokens: InMemoryTokenLedger, key: PoolKey, holder: string, label = holder) {
  const poolConfig = getCurrentPoolConfig();
  for (const asset of [Asset.A, Asset.B]) {
    const balance = tokens.balanceOf(currencyOf(key, asset), holder);
    console.log(`${label} ${poolConfig.getSymbol(asset)} balance: ${poolConfig.getFormattedAmount(asset, balance)}`);
  }
}
