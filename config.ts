import { setCurrentPoolConfig, USDC_WETH_CONFIG } from "./src/pool-config";

// Initialize the pool configuration (this will be used by the simulation harness and scripts)
// To simulate a different pair, change this line to import and set a different configuration
setCurrentPoolConfig(USDC_WETH_CONFIG);

// Allow overriding via env so scripted runs can tweak the harness without file patching
function parseEnvJSON<T>(envKey: string): T | undefined {
  const raw = process.env[envKey];
  if (!raw) return undefined;
  try {
    return JSON.parse(raw) as T;
  } catch (e) {
    console.warn(`Failed to parse ${envKey}:`, e);
    return undefined;
  }
}

function parseBooleanEnv(envKey: string): boolean {
  const raw = (process.env[envKey] ?? "").trim().toLowerCase();
  return raw === "true" || raw === "1";
}

/// Verbose per-operation ledger logging ([FUND], [DEFUND], [MATCH], [UNWIND])
export const DEBUG_LEDGER = parseBooleanEnv("DEBUG_LEDGER");

/// @param: hookAddress - Address the hook holds custody under and settles from
/// @param: poolManagerAddress - The only caller allowed to bind pools and deliver liquidity notifications
/// @param: checkInvariants - Re-verify reservoir/debt conservation after every committed operation
export type HookConfig = {
  hookAddress: string;
  poolManagerAddress: string;
  checkInvariants: boolean;
};

export const hookConfig: HookConfig = (() => {
  const override = parseEnvJSON<Partial<HookConfig>>("SSLH_HOOK_JSON");
  const defaults = {
    hookAddress: "0x5d8c6a1b3c0e3e0a1f3b8b6e1c2d4f5a6b7c8d9e",
    poolManagerAddress: "0x000000000004444c5dc75cb358380d2e3de08a90",
    checkInvariants: true,
  } satisfies HookConfig;
  return { ...defaults, ...override };
})();

/// @param: dbPath - SQLite file for the simulator's internal data (":memory:" keeps it in process)
/// @param: ledgerLogDbPath - SQLite file the simulation script writes ledger events to
/// @param: sqrtPriceX96 - Initial pool price as a Q64.96 decimal string (2^96 = price 1)
export type SimulationConfig = {
  dbPath: string;
  ledgerLogDbPath: string;
  sqrtPriceX96: string;
};

export const simulationConfig: SimulationConfig = (() => {
  const override = parseEnvJSON<Partial<SimulationConfig>>("SSLH_SIM_JSON");
  const defaults = {
    dbPath: ":memory:",
    ledgerLogDbPath: "ledger_log.db",
    sqrtPriceX96: "79228162514264337593543950336",
  } satisfies SimulationConfig;
  return { ...defaults, ...override };
})();
