import { BigNumber, BytesLike, utils } from "ethers";
import { Asset } from "../enums";
import { HookErrorCode } from "./errors";
import { MatchInstruction } from "./types";

export const NO_MATCH: MatchInstruction = { kind: "none" };

// abi.encode(uint8) selector values
const ASSET_SELECTORS: Record<Asset, number> = {
  [Asset.A]: 0,
  [Asset.B]: 1,
};

/**
 * Hook data -> instruction. Empty data asks for no matching; a single ABI word
 * holding 0 or 1 selects asset A or B. Every other payload is rejected rather
 * than read as "no matching".
 */
export function decodeMatchInstruction(hookData: BytesLike): MatchInstruction {
  if (!utils.isBytesLike(hookData)) throw new Error(HookErrorCode.INVALID_ASSET_SELECTION);
  const length = utils.hexDataLength(hookData);
  if (length === 0) return NO_MATCH;
  if (length !== 32) throw new Error(HookErrorCode.INVALID_ASSET_SELECTION);

  const selector = BigNumber.from(utils.hexlify(hookData));
  if (selector.eq(ASSET_SELECTORS[Asset.A])) return { kind: "match", asset: Asset.A };
  if (selector.eq(ASSET_SELECTORS[Asset.B])) return { kind: "match", asset: Asset.B };
  throw new Error(HookErrorCode.INVALID_ASSET_SELECTION);
}

export function encodeMatchInstruction(instruction: MatchInstruction): string {
  if (instruction.kind === "none") return "0x";
  return utils.defaultAbiCoder.encode(["uint8"], [ASSET_SELECTORS[instruction.asset]]);
}
