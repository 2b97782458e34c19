import JSBI from "jsbi";
import { simulationConfig } from "../config";
import { print } from "../src/account";
import { Asset } from "../src/enums";
import { encodeMatchInstruction } from "../src/hook/instruction";
import { ModifyLiquidityParams } from "../src/hook/types";
import { LedgerLogDBManager, collectLedgerLogs } from "../src/ledger-log";
import { buildSimulation } from "../src/simulation";
import { fmtUTC } from "../src/utils";

// Scenario: one depositor funds the WETH reservoir, two USDC-only providers
// add liquidity against it (the second only partly matched), then the first
// withdraws and the depositor takes back whatever surplus is left.
const ALICE = "0x000000000000000000000000000000000000a11c";
const BOB = "0x0000000000000000000000000000000000000b0b";
const CAROL = "0x00000000000000000000000000000000000ca201";

const MATCH_B = encodeMatchInstruction({ kind: "match", asset: Asset.B });

const range = (liquidityDelta: JSBI): ModifyLiquidityParams => ({
  tickLower: -600,
  tickUpper: 600,
  liquidityDelta,
  salt: 0,
});

async function main() {
  const sim = await buildSimulation(simulationConfig);
  const { hook, manager, tokens, poolKey, poolConfig } = sim;
  const { logs, detach } = collectLedgerLogs(hook);

  console.log(`[SIM] ${poolConfig.getDisplayName()} started ${fmtUTC(new Date())}`);

  tokens.mint(poolKey.currencyB, ALICE, poolConfig.toRaw(Asset.B, 1));
  tokens.mint(poolKey.currencyA, BOB, poolConfig.toRaw(Asset.A, 100000000000));
  tokens.mint(poolKey.currencyA, CAROL, poolConfig.toRaw(Asset.A, 100000000000));
  tokens.mint(poolKey.currencyB, CAROL, poolConfig.toRaw(Asset.B, 1));

  await hook.fund(ALICE, poolKey, Asset.B, poolConfig.toRaw(Asset.B, 1));

  const bobLiquidity = JSBI.BigInt("10000000000000000000");
  const bobAdd = await manager.modifyLiquidity(BOB, poolKey, range(bobLiquidity), MATCH_B);
  console.log(`[SIM] Bob paid ${poolConfig.getFormattedAmount(Asset.A, bobAdd.callerDelta.amountA)}, reservoir fronted ${poolConfig.getFormattedAmount(Asset.B, bobAdd.hookDelta.amountB)}`);

  const carolAdd = await manager.modifyLiquidity(CAROL, poolKey, range(JSBI.BigInt("30000000000000000000")), MATCH_B);
  console.log(`[SIM] Carol paid ${poolConfig.getFormattedAmount(Asset.B, carolAdd.callerDelta.amountB)} of their own, reservoir fronted ${poolConfig.getFormattedAmount(Asset.B, carolAdd.hookDelta.amountB)}`);

  await manager.modifyLiquidity(BOB, poolKey, range(JSBI.unaryMinus(bobLiquidity)));

  const available = hook.unmatchedLiquidity(poolKey, Asset.B);
  if (JSBI.greaterThan(available, JSBI.BigInt(0))) {
    await hook.defund(ALICE, poolKey, Asset.B, available);
  }
  detach();

  hook.verifyInvariants(poolKey);
  console.log("[SIM] Ledger:", JSON.stringify(hook.snapshot(poolKey), null, 2));
  print(tokens, poolKey, ALICE, "Alice");
  print(tokens, poolKey, BOB, "Bob");
  print(tokens, poolKey, CAROL, "Carol");
  print(tokens, poolKey, hook.address, "Hook");

  const logDB = new LedgerLogDBManager(simulationConfig.ledgerLogDbPath);
  try {
    await logDB.initTables();
    await logDB.clearLedgerLogs();
    const written = await logDB.persistLedgerLogs(logs);
    console.log(`[SIM] Wrote ${written} ledger events to ${simulationConfig.ledgerLogDbPath}`);
  } finally {
    await logDB.close();
    await sim.shutdown();
  }
}

main()
  .then(() => process.exit(0))
  .catch((error) => {
    console.error(error);
    process.exit(1);
  });
