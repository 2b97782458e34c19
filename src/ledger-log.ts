import knexBuilder from "knex";
import type { Knex } from "knex";
import { Asset, HookEvent } from "./enums";
import type {
  FundingEvent,
  MatchedEvent,
  PoolBoundEvent,
  SingleSidedLiquidityHook,
  UnwoundEvent,
} from "./hook/single-sided-hook";

const TABLE = "ledgerLog";

/** One ledger event; amounts as decimal strings, null where the event has none */
export interface LedgerLog {
  event: HookEvent;
  poolId: string;
  actor: string; // depositor for funding events, position key for matching/unwinding, hook on bind
  asset: Asset | null;
  amount: string | null;
  fronted: string | null;
  reclaimed: string | null;
  debt: string | null;
  balance: string | null;
  reservoir: string | null;
  timestamp: string;
}

const EMPTY = {
  asset: null,
  amount: null,
  fronted: null,
  reclaimed: null,
  debt: null,
  balance: null,
  reservoir: null,
};

/**
 * Buffer every ledger event `hook` emits as a LedgerLog row, in emission order.
 * `detach` removes the listeners.
 */
export function collectLedgerLogs(hook: SingleSidedLiquidityHook): { logs: LedgerLog[]; detach: () => void } {
  const logs: LedgerLog[] = [];

  const onBound = (e: PoolBoundEvent) => {
    logs.push({ ...EMPTY, event: HookEvent.POOL_BOUND, poolId: e.poolId, actor: e.key.hooks, timestamp: e.timestamp });
  };
  const funding = (event: HookEvent.FUNDED | HookEvent.DEFUNDED) => (e: FundingEvent) => {
    logs.push({
      ...EMPTY,
      event,
      poolId: e.poolId,
      actor: e.depositor,
      asset: e.asset,
      amount: e.amount.toString(),
      balance: e.balance.toString(),
      reservoir: e.reservoir.toString(),
      timestamp: e.timestamp,
    });
  };
  const onFunded = funding(HookEvent.FUNDED);
  const onDefunded = funding(HookEvent.DEFUNDED);
  const onMatched = (e: MatchedEvent) => {
    logs.push({
      ...EMPTY,
      event: HookEvent.MATCHED,
      poolId: e.poolId,
      actor: e.position,
      asset: e.asset,
      amount: e.need.toString(),
      fronted: e.fronted.toString(),
      debt: e.debt.toString(),
      reservoir: e.reservoir.toString(),
      timestamp: e.timestamp,
    });
  };
  const onUnwound = (e: UnwoundEvent) => {
    logs.push({
      ...EMPTY,
      event: HookEvent.UNWOUND,
      poolId: e.poolId,
      actor: e.position,
      asset: e.asset,
      amount: e.amount.toString(),
      reclaimed: e.reclaimed.toString(),
      debt: e.debt.toString(),
      reservoir: e.reservoir.toString(),
      timestamp: e.timestamp,
    });
  };

  hook
    .on(HookEvent.POOL_BOUND, onBound)
    .on(HookEvent.FUNDED, onFunded)
    .on(HookEvent.DEFUNDED, onDefunded)
    .on(HookEvent.MATCHED, onMatched)
    .on(HookEvent.UNWOUND, onUnwound);

  const detach = () => {
    hook
      .off(HookEvent.POOL_BOUND, onBound)
      .off(HookEvent.FUNDED, onFunded)
      .off(HookEvent.DEFUNDED, onDefunded)
      .off(HookEvent.MATCHED, onMatched)
      .off(HookEvent.UNWOUND, onUnwound);
  };

  return { logs, detach };
}

export class LedgerLogDBManager {
  private knex: Knex;

  constructor(dbPath: string) {
    const config: Knex.Config = {
      client: "sqlite3",
      connection: {
        filename: dbPath, //:memory:
      },
      // sqlite does not support inserting default values. Set the `useNullAsDefault` flag to hide the warning.
      useNullAsDefault: true,
    };
    this.knex = knexBuilder(config);
  }

  async initTables(): Promise<void> {
    const exists = await this.knex.schema.hasTable(TABLE);
    if (exists) return;
    await this.knex.schema.createTable(TABLE, (t: Knex.TableBuilder) => {
      t.increments("id").primary();
      t.string("event", 32);
      t.string("poolId", 66);
      t.string("actor", 255);
      t.string("asset", 1);
      t.string("amount", 255);
      t.string("fronted", 255);
      t.string("reclaimed", 255);
      t.string("debt", 255);
      t.string("balance", 255);
      t.string("reservoir", 255);
      t.text("timestamp");
    });
  }

  /** Insert `logs` in one transaction; resolves to the number of rows written */
  async persistLedgerLogs(logs: LedgerLog[]): Promise<number> {
    if (logs.length === 0) return 0;
    await this.knex.transaction((trx) => this.getBuilderContext(TABLE, trx).insert(logs));
    return logs.length;
  }

  async getLedgerLogs(event?: HookEvent): Promise<LedgerLog[]> {
    const query = this.knex(TABLE)
      .select("event", "poolId", "actor", "asset", "amount", "fronted", "reclaimed", "debt", "balance", "reservoir", "timestamp")
      .orderBy("id", "asc");
    const rows: LedgerLog[] = await (event ? query.where("event", event) : query);
    return rows;
  }

  clearLedgerLogs(): Promise<number> {
    return this.knex(TABLE).del();
  }

  close(): Promise<void> {
    return this.knex.destroy();
  }

  private getBuilderContext(tableName: string, trx?: Knex.Transaction): Knex.QueryBuilder {
    return trx ? trx(tableName) : this.knex(tableName);
  }
}
