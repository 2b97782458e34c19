import JSBI from "jsbi";
import { FeeAmount } from "@bella-defintech/uniswap-v3-simulator";

// constants used internally but not expected to be used externally
export const ZERO = JSBI.BigInt(0);
export const ONE = JSBI.BigInt(1);
export const MaxUint128 = JSBI.subtract(
  JSBI.exponentiate(JSBI.BigInt(2), JSBI.BigInt(128)),
  ONE
);

// The default factory tick spacings by fee amount.
export const TICK_SPACINGS: { [amount in FeeAmount]: number } = {
  [FeeAmount.LOW]: 10,
  [FeeAmount.MEDIUM]: 60,
  [FeeAmount.HIGH]: 200,
};

export const EMPTY_HOOK_DATA = "0x";
