import JSBI from "jsbi";
import { BytesLike } from "ethers";
import {
  ConfigurableCorePool,
  CorePoolView,
  FeeAmount,
  PoolConfig as SimulatorPoolConfig,
  SimulatorClient,
} from "@bella-defintech/uniswap-v3-simulator";
import { InMemoryTokenLedger } from "./account";
import { Asset } from "./enums";
import { HookErrorCode } from "./hook/errors";
import { ASSETS } from "./hook/ledger-state";
import { PositionKey, currencyOf, normalizeAddress, toPoolId, validatePoolKey } from "./hook/position-key";
import { SerialQueue } from "./hook/serial-queue";
import {
  BalanceDelta,
  CommitCheck,
  LiquidityHooks,
  ModifyLiquidityParams,
  PoolKey,
  SettlementAuthority,
} from "./hook/types";
import { EMPTY_HOOK_DATA, MaxUint128, TICK_SPACINGS } from "./internal_constants";
import { ZERO, abs, add, isNegative, isPositive, neg, sub, toBig } from "./utils";

export interface ModifyLiquidityResult {
  delta: BalanceDelta;      // what the pool itself moved, caller's point of view
  hookDelta: BalanceDelta;  // the hook's share of `delta`
  callerDelta: BalanceDelta; // delta - hookDelta, settled against the caller's tokens
}

/**
 * A pool manager that drives hook callbacks around a simulated core pool and
 * keeps flash-accounting currency deltas per actor. Nothing is broadcast.
 */
export interface PoolManager {
  readonly address: string;

  registerHook(hook: LiquidityHooks): void;

  initialize(key: PoolKey, sqrtPriceX96: JSBI): Promise<string>;

  modifyLiquidity(
    sender: string,
    key: PoolKey,
    params: ModifyLiquidityParams,
    hookData?: BytesLike
  ): Promise<ModifyLiquidityResult>;

  /** Settlement surface bound to `actor`, handed to hooks at construction */
  authorityFor(actor: string): SettlementAuthority;

  currencyDelta(actor: string, currency: string): JSBI;

  poolView(key: PoolKey): CorePoolView;
}

export interface DryRunPoolManagerParams {
  address: string;
  tokens: InMemoryTokenLedger;
  simulatorClient: SimulatorClient;
}

function toFeeAmount(fee: number, tickSpacing: number): FeeAmount {
  const feeAmount = [FeeAmount.LOW, FeeAmount.MEDIUM, FeeAmount.HIGH].find((f) => f === fee);
  if (feeAmount === undefined || TICK_SPACINGS[feeAmount] !== tickSpacing) {
    throw new Error(HookErrorCode.UNSUPPORTED_FEE);
  }
  return feeAmount;
}

const amountOf = (delta: BalanceDelta, asset: Asset) => (asset === Asset.A ? delta.amountA : delta.amountB);

const callerDeltaOf = (delta: BalanceDelta, hookDelta: BalanceDelta): BalanceDelta => ({
  amountA: sub(delta.amountA, hookDelta.amountA),
  amountB: sub(delta.amountB, hookDelta.amountB),
});

export function buildDryRunPoolManager(params: DryRunPoolManagerParams): PoolManager {
  const address = normalizeAddress(params.address);
  const { tokens, simulatorClient } = params;

  const hooks: Map<string, LiquidityHooks> = new Map();
  const corePools: Map<string, ConfigurableCorePool> = new Map();
  // actor -> currency -> delta; positive means the manager owes the actor
  const deltas: Map<string, Map<string, JSBI>> = new Map();
  // one unlock at a time, like the on-chain lock
  const lock = new SerialQueue();

  function currencyDelta(actor: string, currency: string): JSBI {
    return deltas.get(normalizeAddress(actor))?.get(normalizeAddress(currency)) ?? ZERO;
  }

  function accountDelta(actor: string, currency: string, amount: JSBI): void {
    const who = normalizeAddress(actor);
    let perCurrency = deltas.get(who);
    if (!perCurrency) {
      perCurrency = new Map();
      deltas.set(who, perCurrency);
    }
    const c = normalizeAddress(currency);
    perCurrency.set(c, add(perCurrency.get(c) ?? ZERO, amount));
  }

  // Move tokens back for whatever `actor` left open, then forget its deltas.
  function revertDeltas(actor: string): void {
    const who = normalizeAddress(actor);
    for (const [currency, delta] of deltas.get(who) ?? []) {
      const moved = isPositive(delta)
        ? tokens.transfer(currency, address, who, delta)
        : isNegative(delta)
        ? tokens.transfer(currency, who, address, neg(delta))
        : true;
      if (!moved) console.warn(`[MANAGER] could not revert ${delta.toString()} of ${currency} for ${who}`);
    }
    deltas.delete(who);
  }

  function authorityFor(actor: string): SettlementAuthority {
    const who = normalizeAddress(actor);
    return {
      settle: async (currency: string, amount: JSBI) => {
        if (!tokens.transfer(currency, who, address, amount)) throw new Error(HookErrorCode.TRANSFER_FAILED);
        accountDelta(who, currency, amount);
      },
      take: async (currency: string, amount: JSBI) => {
        if (!tokens.transfer(currency, address, who, amount)) throw new Error(HookErrorCode.TRANSFER_FAILED);
        accountDelta(who, currency, neg(amount));
      },
    };
  }

  function registerHook(hook: LiquidityHooks): void {
    hooks.set(normalizeAddress(hook.address), hook);
  }

  function hookFor(key: PoolKey): LiquidityHooks {
    const hook = hooks.get(normalizeAddress(key.hooks));
    if (!hook) throw new Error(HookErrorCode.UNKNOWN_HOOK);
    return hook;
  }

  function corePoolFor(key: PoolKey): ConfigurableCorePool {
    const pool = corePools.get(toPoolId(key));
    if (!pool) throw new Error(HookErrorCode.POOL_NOT_INITIALIZED);
    return pool;
  }

  async function initialize(key: PoolKey, sqrtPriceX96: JSBI): Promise<string> {
    const poolKey = validatePoolKey(key);
    const hook = hookFor(poolKey);
    const feeAmount = toFeeAmount(poolKey.fee, poolKey.tickSpacing);

    const poolId = await hook.bindPool(address, poolKey);
    const corePool = simulatorClient.initCorePoolFromConfig(
      new SimulatorPoolConfig(poolKey.tickSpacing, poolKey.currencyA, poolKey.currencyB, feeAmount)
    );
    await corePool.initialize(sqrtPriceX96);
    corePools.set(poolId, corePool);
    console.log(`[MANAGER] Initialized pool ${poolId} at sqrtPriceX96 ${sqrtPriceX96.toString()}`);
    return poolId;
  }

  function requireAffordable(sender: string, key: PoolKey, callerDelta: BalanceDelta): void {
    for (const asset of ASSETS) {
      const owed = amountOf(callerDelta, asset);
      if (isNegative(owed) && JSBI.lessThan(tokens.balanceOf(currencyOf(key, asset), sender), neg(owed))) {
        throw new Error(HookErrorCode.CURRENCY_NOT_SETTLED);
      }
    }
  }

  // The hook's settlements must cover exactly what it claims, and the caller
  // must be able to pay the rest.
  function requireSettled(
    hookAddress: string,
    sender: string,
    key: PoolKey,
    delta: BalanceDelta,
    hookDelta: BalanceDelta
  ): void {
    for (const asset of ASSETS) {
      const open = add(currencyDelta(hookAddress, currencyOf(key, asset)), amountOf(hookDelta, asset));
      if (!JSBI.equal(open, ZERO)) throw new Error(HookErrorCode.CURRENCY_NOT_SETTLED);
    }
    requireAffordable(sender, key, callerDeltaOf(delta, hookDelta));
  }

  // Moves the caller's share of the delta through the token ledger.
  function settleCaller(sender: string, key: PoolKey, callerDelta: BalanceDelta): void {
    requireAffordable(sender, key, callerDelta);
    for (const asset of ASSETS) {
      const amount = amountOf(callerDelta, asset);
      const currency = currencyOf(key, asset);
      const ok = isNegative(amount)
        ? tokens.transfer(currency, sender, address, neg(amount))
        : isPositive(amount)
        ? tokens.transfer(currency, address, sender, amount)
        : true;
      if (!ok) throw new Error(HookErrorCode.CURRENCY_NOT_SETTLED);
    }
  }

  async function applyToCorePool(
    corePool: ConfigurableCorePool,
    owner: string,
    params: ModifyLiquidityParams
  ): Promise<BalanceDelta> {
    const { tickLower, tickUpper, liquidityDelta } = params;
    if (isPositive(liquidityDelta)) {
      const { amount0, amount1 } = await corePool.mint(owner, tickLower, tickUpper, liquidityDelta);
      return { amountA: neg(toBig(amount0)), amountB: neg(toBig(amount1)) };
    }
    await corePool.burn(owner, tickLower, tickUpper, abs(liquidityDelta));
    const { amount0, amount1 } = await corePool.collect(owner, tickLower, tickUpper, MaxUint128, MaxUint128);
    return { amountA: toBig(amount0), amountB: toBig(amount1) };
  }

  function modifyLiquidity(
    sender: string,
    key: PoolKey,
    params: ModifyLiquidityParams,
    hookData: BytesLike = EMPTY_HOOK_DATA
  ): Promise<ModifyLiquidityResult> {
    return lock.run(async () => {
      const poolKey = validatePoolKey(key);
      const caller = normalizeAddress(sender);
      const hook = hookFor(poolKey);
      const corePool = corePoolFor(poolKey);
      if (JSBI.equal(params.liquidityDelta, ZERO)) throw new Error(HookErrorCode.ZERO_LIQUIDITY);

      // positions are owned per (caller, salt) in the core pool as well
      const owner = PositionKey.from(caller, params.salt).toString();
      const delta = await applyToCorePool(corePool, owner, params);

      // runs inside the hook, before it commits its draft
      const beforeCommit: CommitCheck = (claimed) =>
        requireSettled(hook.address, caller, poolKey, delta, claimed);

      let hookDelta: BalanceDelta;
      try {
        hookDelta = isPositive(params.liquidityDelta)
          ? await hook.afterAddLiquidity(address, caller, poolKey, params, delta, hookData, beforeCommit)
          : await hook.afterRemoveLiquidity(address, caller, poolKey, params, delta, hookData, beforeCommit);
        requireSettled(hook.address, caller, poolKey, delta, hookDelta);
      } catch (err) {
        revertDeltas(hook.address);
        throw err;
      }
      deltas.delete(normalizeAddress(hook.address));

      const callerDelta = callerDeltaOf(delta, hookDelta);
      settleCaller(caller, poolKey, callerDelta);
      return { delta, hookDelta, callerDelta };
    });
  }

  function poolView(key: PoolKey): CorePoolView {
    return corePoolFor(validatePoolKey(key)).getCorePool();
  }

  return { address, registerHook, initialize, modifyLiquidity, authorityFor, currencyDelta, poolView };
}
