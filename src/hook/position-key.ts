import { BigNumber, utils } from "ethers";
import { Asset } from "../enums";
import { HookErrorCode } from "./errors";
import { PoolKey, Salt } from "./types";

/** Checksummed form of `value`; anything that is not a 20-byte address is rejected */
export function normalizeAddress(value: string): string {
  try {
    return utils.getAddress(value);
  } catch (e) {
    throw new Error(HookErrorCode.INVALID_ADDRESS);
  }
}

/** Left-padded 32-byte hex form of `salt` */
export function normalizeSalt(salt: Salt): string {
  try {
    const hex = utils.hexlify(salt, { hexPad: "left" });
    return utils.hexZeroPad(hex, 32);
  } catch (e) {
    throw new Error(HookErrorCode.INVALID_SALT);
  }
}

/**
 * Stable identity of one liquidity position: the controller that modifies it
 * plus a salt that tells apart several positions of the same controller.
 *
 * Both parts are normalized to fixed-width forms, so `(0xAb.., 1)` and
 * `(0xab.., "0x01")` are the same position.
 */
export class PositionKey {
  private constructor(readonly controller: string, readonly salt: string) {}

  static from(controller: string, salt: Salt): PositionKey {
    return new PositionKey(normalizeAddress(controller), normalizeSalt(salt));
  }

  equals(other: PositionKey): boolean {
    return this.controller === other.controller && this.salt === other.salt;
  }

  toString(): string {
    return `${this.controller}/${this.salt}`;
  }
}

export function validatePoolKey(key: PoolKey): PoolKey {
  const currencyA = normalizeAddress(key.currencyA);
  const currencyB = normalizeAddress(key.currencyB);
  if (!BigNumber.from(currencyA).lt(BigNumber.from(currencyB))) {
    throw new Error(HookErrorCode.CURRENCIES_OUT_OF_ORDER);
  }
  return { ...key, currencyA, currencyB, hooks: normalizeAddress(key.hooks) };
}

/** keccak256(abi.encode(poolKey)) */
export function toPoolId(key: PoolKey): string {
  const k = validatePoolKey(key);
  return utils.keccak256(
    utils.defaultAbiCoder.encode(
      ["address", "address", "uint24", "int24", "address"],
      [k.currencyA, k.currencyB, k.fee, k.tickSpacing, k.hooks]
    )
  );
}

export function currencyOf(key: PoolKey, asset: Asset): string {
  return asset === Asset.A ? key.currencyA : key.currencyB;
}
