/**
 * Pool Configuration System
 *
 * Describes the token pair a simulated pool is bound to, independent of the
 * hook that matches liquidity for it. Asset A is always the numerically lower
 * token address (the pool's currency0), asset B the higher one.
 */

import { BigNumber, utils } from "ethers";
import { JSBI, PoolKey } from "./hook/types";
import { Asset } from "./enums";

export interface TokenConfig {
  symbol: string;
  name: string;
  decimals: number;
  address: string;
}

export interface PoolConfig {
  // Token configuration (sorted: tokenA.address < tokenB.address)
  tokenA: TokenConfig;
  tokenB: TokenConfig;

  // Pool geometry forwarded to the AMM engine
  fee: number;       // 500, 3000, 10000
  tickSpacing: number;

  // Display configuration
  displayName: string; // e.g., "USDC-WETH 0.3%"
}

export class PoolConfigManager {
  private config: PoolConfig;

  constructor(config: PoolConfig) {
    this.config = config;
    this.validateConfig();
  }

  private validateConfig(): void {
    const a = utils.getAddress(this.config.tokenA.address);
    const b = utils.getAddress(this.config.tokenB.address);
    if (a === b) {
      throw new Error("Token A and token B must be different");
    }
    if (!BigNumber.from(a).lt(BigNumber.from(b))) {
      throw new Error("Token A must have the lower address");
    }
    if (this.config.tickSpacing <= 0) {
      throw new Error("Tick spacing must be positive");
    }
  }

  getDisplayName(): string {
    return this.config.displayName;
  }

  getToken(asset: Asset): TokenConfig {
    return asset === Asset.A ? this.config.tokenA : this.config.tokenB;
  }

  getSymbol(asset: Asset): string {
    return this.getToken(asset).symbol;
  }

  getDecimals(asset: Asset): number {
    return this.getToken(asset).decimals;
  }

  /** Pool key for a pool of this pair served by `hooks` */
  toPoolKey(hooks: string): PoolKey {
    return {
      currencyA: utils.getAddress(this.config.tokenA.address),
      currencyB: utils.getAddress(this.config.tokenB.address),
      fee: this.config.fee,
      tickSpacing: this.config.tickSpacing,
      hooks: utils.getAddress(hooks),
    };
  }

  /**
   * Whole token units to raw units, e.g. `toRaw(Asset.B, 2)` = 2e18 for WETH
   */
  toRaw(asset: Asset, wholeUnits: number): JSBI {
    const divisor = JSBI.exponentiate(JSBI.BigInt(10), JSBI.BigInt(this.getDecimals(asset)));
    return JSBI.multiply(JSBI.BigInt(wholeUnits), divisor);
  }

  // Formatting helpers for reports; signed amounts keep their sign
  getFormattedAmount(asset: Asset, amount: JSBI): string {
    const decimals = this.getDecimals(asset);
    const negative = JSBI.lessThan(amount, JSBI.BigInt(0));
    const abs = negative ? JSBI.unaryMinus(amount) : amount;
    const divisor = JSBI.exponentiate(JSBI.BigInt(10), JSBI.BigInt(decimals));
    const wholePart = JSBI.divide(abs, divisor);
    const remainder = JSBI.remainder(abs, divisor);
    const fractionalPart = remainder.toString().padStart(decimals, "0");
    return `${negative ? "-" : ""}${wholePart.toString()}.${fractionalPart} ${this.getSymbol(asset)}`;
  }
}

// Pre-configured pool configurations
export const USDC_WETH_CONFIG: PoolConfig = {
  tokenA: {
    symbol: "USDC",
    name: "USD Coin",
    decimals: 6,
    address: "0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48",
  },
  tokenB: {
    symbol: "WETH",
    name: "Wrapped Ethereum",
    decimals: 18,
    address: "0xC02aaA39b223FE8D0A0e5C4F27eAD9083C756Cc2",
  },
  fee: 3000,
  tickSpacing: 60,
  displayName: "USDC-WETH 0.3%",
};

export const WBTC_USDT_CONFIG: PoolConfig = {
  tokenA: {
    symbol: "WBTC",
    name: "Wrapped Bitcoin",
    decimals: 8,
    address: "0x2260FAC5E5542a773Aa44fBCfeDf7C193bc2C599",
  },
  tokenB: {
    symbol: "USDT",
    name: "Tether USD",
    decimals: 6,
    address: "0xdAC17F958D2ee523a2206206994597C13D831ec7",
  },
  fee: 500,
  tickSpacing: 10,
  displayName: "WBTC-USDT 0.05%",
};

// Global pool configuration instance
let currentPoolConfig: PoolConfigManager | null = null;

export function setCurrentPoolConfig(config: PoolConfig): void {
  currentPoolConfig = new PoolConfigManager(config);
}

export function getCurrentPoolConfig(): PoolConfigManager {
  if (!currentPoolConfig) {
    // Default to USDC-WETH if no config is set
    currentPoolConfig = new PoolConfigManager(USDC_WETH_CONFIG);
  }
  return currentPoolConfig;
}

// Convenience function to create a custom pool config; sorts the pair by address
export function createPoolConfig(
  first: TokenConfig,
  second: TokenConfig,
  fee: number,
  tickSpacing: number
): PoolConfig {
  const firstIsLower = BigNumber.from(utils.getAddress(first.address)).lt(
    BigNumber.from(utils.getAddress(second.address))
  );
  const tokenA = firstIsLower ? first : second;
  const tokenB = firstIsLower ? second : first;

  return {
    tokenA,
    tokenB,
    fee,
    tickSpacing,
    displayName: `${tokenA.symbol}-${tokenB.symbol} ${(fee / 10000).toFixed(2)}%`,
  };
}
