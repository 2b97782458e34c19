import JSBI from "jsbi";
import {
  SimulationDataManager,
  SimulatorClient,
  SQLiteSimulationDataManager,
} from "@bella-defintech/uniswap-v3-simulator";
import { hookConfig, simulationConfig, SimulationConfig } from "../config";
import { InMemoryTokenLedger } from "./account";
import { PoolManager, buildDryRunPoolManager } from "./engine";
import { SingleSidedLiquidityHook } from "./hook/single-sided-hook";
import { PoolKey } from "./hook/types";
import { PoolConfigManager, getCurrentPoolConfig } from "./pool-config";

export interface Simulation {
  client: SimulatorClient;
  manager: PoolManager;
  hook: SingleSidedLiquidityHook;
  tokens: InMemoryTokenLedger;
  poolKey: PoolKey;
  poolConfig: PoolConfigManager;
  shutdown: () => Promise<void>;
}

/**
 * Wire a hook to a dry-run pool manager over a fresh simulated core pool of
 * the current pool configuration, and initialize that pool.
 */
export async function buildSimulation(config: SimulationConfig = simulationConfig): Promise<Simulation> {
  // 1. Instantiate a SimulationDataManager
  // this is for handling the internal data (snapshots, roadmaps, etc.)
  const simulationDataManager: SimulationDataManager = await SQLiteSimulationDataManager.buildInstance(config.dbPath);
  const client = new SimulatorClient(simulationDataManager);
  const poolConfig = getCurrentPoolConfig();

  // 2. One token ledger shared by depositors, the hook's custody and the manager's vault
  const tokens = new InMemoryTokenLedger();
  const manager = buildDryRunPoolManager({
    address: hookConfig.poolManagerAddress,
    tokens,
    simulatorClient: client,
  });

  // 3. The hook settles through the manager and holds custody under its own address
  const hook = new SingleSidedLiquidityHook({
    address: hookConfig.hookAddress,
    poolManager: manager.address,
    settlement: manager.authorityFor(hookConfig.hookAddress),
    transfers: tokens.agentFor(hookConfig.hookAddress),
  });
  manager.registerHook(hook);

  // 4. Bind and initialize the pool
  const poolKey = poolConfig.toPoolKey(hook.address);
  await manager.initialize(poolKey, JSBI.BigInt(config.sqrtPriceX96));

  async function shutdown() {
    await client.shutdown();
  }

  return { client, manager, hook, tokens, poolKey, poolConfig, shutdown };
}
