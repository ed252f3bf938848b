import sqlite3 from "sqlite3";
import logger from "../utils/logger";
import {
  BatchSummary,
  isOrderStatus,
  Order,
  OrderKind,
  OrderStats,
  OrderStatus,
} from "../models/order.model";

/** Persistence contract the lifecycle depends on. */
export interface OrderStore {
  save(order: Order): Promise<void>;
  get(jobId: string): Promise<Order | null>;
  findByWindow(
    aoiLabel: string,
    startDate: string,
    endDate: string,
    filter?: { status?: OrderStatus; kind?: OrderKind },
  ): Promise<Order | null>;
  listPending(): Promise<Order[]>;
  listByBatch(batchId: string): Promise<Order[]>;
  listByAoi(aoiLabel: string): Promise<Order[]>;
  listByStatus(status: OrderStatus): Promise<Order[]>;
  listBatches(): Promise<BatchSummary[]>;
  updateStatus(jobId: string, status: OrderStatus): Promise<Order | null>;
  stats(): Promise<OrderStats>;
}

type SqlParam = string | number | null;

interface RecordRow {
  record: string;
}

interface StatsRow {
  total_orders: number | null;
  total_batches: number | null;
  total_aois: number | null;
  total_scenes: number | null;
  total_quota_ha: number | null;
  completed_orders: number | null;
  pending_orders: number | null;
  failed_orders: number | null;
}

interface BatchRow {
  batch_id: string;
  order_count: number;
}

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS orders (
    job_id TEXT PRIMARY KEY,
    aoi_label TEXT NOT NULL,
    kind TEXT NOT NULL,
    batch_id TEXT,
    start_date TEXT NOT NULL,
    end_date TEXT NOT NULL,
    status TEXT NOT NULL,
    scenes_selected INTEGER,
    quota_hectares REAL,
    record TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT DEFAULT CURRENT_TIMESTAMP
  )`,
  `CREATE INDEX IF NOT EXISTS idx_orders_batch ON orders(batch_id)`,
  `CREATE INDEX IF NOT EXISTS idx_orders_window ON orders(aoi_label, start_date, end_date)`,
  `CREATE INDEX IF NOT EXISTS idx_orders_status ON orders(status)`,
  `CREATE INDEX IF NOT EXISTS idx_orders_created ON orders(created_at)`,
];

function parseRecord(raw: string): Order {
  const order: Order = JSON.parse(raw);
  if (typeof order.jobId !== "string" || !isOrderStatus(order.status)) {
    throw new Error(`Corrupt order record: ${raw.slice(0, 200)}`);
  }
  return order;
}

class DBService implements OrderStore {
  private db: sqlite3.Database;
  private queue: Promise<unknown> = Promise.resolve();

  private constructor(db: sqlite3.Database) {
    this.db = db;
  }

  /** Opens (or creates) the store at `dbPath`; ":memory:" works too. */
  static async open(dbPath: string): Promise<DBService> {
    const db = await new Promise<sqlite3.Database>((resolve, reject) => {
      const handle = new sqlite3.Database(dbPath, (err) => {
        if (err) {
          logger.error("Could not connect to database", err);
          reject(err);
        } else {
          resolve(handle);
        }
      });
    });

    const service = new DBService(db);
    await service.transaction(async () => {
      for (const statement of SCHEMA) {
        await service.run(statement);
      }
    });
    logger.info(`Connected to order store at ${dbPath}`);
    return service;
  }

  async close(): Promise<void> {
    await this.queue;
    await new Promise<void>((resolve, reject) => {
      this.db.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  async save(order: Order): Promise<void> {
    await this.transaction(() => this.upsert(order));
    logger.debug(`Saved order ${order.jobId}`, { status: order.status });
  }

  async get(jobId: string): Promise<Order | null> {
    return this.transaction(async () => {
      const row = await this.getRow<RecordRow>(
        "SELECT record FROM orders WHERE job_id = ?",
        [jobId],
      );
      return row ? parseRecord(row.record) : null;
    });
  }

  async findByWindow(
    aoiLabel: string,
    startDate: string,
    endDate: string,
    filter: { status?: OrderStatus; kind?: OrderKind } = {},
  ): Promise<Order | null> {
    let sql =
      "SELECT record FROM orders WHERE aoi_label = ? AND start_date = ? AND end_date = ?";
    const params: SqlParam[] = [aoiLabel, startDate, endDate];

    if (filter.status) {
      sql += " AND status = ?";
      params.push(filter.status);
    }
    if (filter.kind) {
      sql += " AND kind = ?";
      params.push(filter.kind);
    }
    sql += " ORDER BY created_at DESC LIMIT 1";

    return this.transaction(async () => {
      const row = await this.getRow<RecordRow>(sql, params);
      return row ? parseRecord(row.record) : null;
    });
  }

  listPending(): Promise<Order[]> {
    return this.listWhere("status IN ('queued', 'running')", [], "created_at ASC");
  }

  listByBatch(batchId: string): Promise<Order[]> {
    return this.listWhere("batch_id = ?", [batchId], "created_at ASC");
  }

  listByAoi(aoiLabel: string): Promise<Order[]> {
    return this.listWhere("aoi_label = ?", [aoiLabel], "created_at DESC");
  }

  listByStatus(status: OrderStatus): Promise<Order[]> {
    return this.listWhere("status = ?", [status], "created_at DESC");
  }

  async listBatches(): Promise<BatchSummary[]> {
    const rows = await this.transaction(() =>
      this.allRows<BatchRow>(
        `SELECT batch_id, COUNT(*) AS order_count
         FROM orders
         WHERE batch_id IS NOT NULL
         GROUP BY batch_id
         ORDER BY MAX(created_at) DESC`,
      ),
    );
    return rows.map((row) => ({ batchId: row.batch_id, orderCount: row.order_count }));
  }

  /** Rewrites the record and its status projection in one unit. */
  async updateStatus(jobId: string, status: OrderStatus): Promise<Order | null> {
    return this.transaction(async () => {
      const row = await this.getRow<RecordRow>(
        "SELECT record FROM orders WHERE job_id = ?",
        [jobId],
      );
      if (!row) {
        return null;
      }
      const updated: Order = {
        ...parseRecord(row.record),
        status,
        updatedAt: new Date().toISOString(),
      };
      await this.upsert(updated);
      return updated;
    });
  }

  async stats(): Promise<OrderStats> {
    const row = await this.transaction(() =>
      this.getRow<StatsRow>(
        `SELECT
           COUNT(*) AS total_orders,
           COUNT(DISTINCT batch_id) AS total_batches,
           COUNT(DISTINCT aoi_label) AS total_aois,
           SUM(scenes_selected) AS total_scenes,
           SUM(quota_hectares) AS total_quota_ha,
           SUM(CASE WHEN status = 'success' THEN 1 ELSE 0 END) AS completed_orders,
           SUM(CASE WHEN status IN ('queued', 'running') THEN 1 ELSE 0 END) AS pending_orders,
           SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) AS failed_orders
         FROM orders`,
      ),
    );

    return {
      totalOrders: row?.total_orders ?? 0,
      totalBatches: row?.total_batches ?? 0,
      totalAois: row?.total_aois ?? 0,
      totalScenes: row?.total_scenes ?? 0,
      totalQuotaHectares: row?.total_quota_ha ?? 0,
      completedOrders: row?.completed_orders ?? 0,
      pendingOrders: row?.pending_orders ?? 0,
      failedOrders: row?.failed_orders ?? 0,
    };
  }

  private async listWhere(
    where: string,
    params: SqlParam[],
    orderBy: string,
  ): Promise<Order[]> {
    const rows = await this.transaction(() =>
      this.allRows<RecordRow>(
        `SELECT record FROM orders WHERE ${where} ORDER BY ${orderBy}`,
        params,
      ),
    );
    return rows.map((row) => parseRecord(row.record));
  }

  private upsert(order: Order): Promise<void> {
    return this.run(
      `INSERT INTO orders (
         job_id, aoi_label, kind, batch_id, start_date, end_date,
         status, scenes_selected, quota_hectares, record, created_at
       ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(job_id) DO UPDATE SET
         aoi_label = excluded.aoi_label,
         kind = excluded.kind,
         batch_id = excluded.batch_id,
         start_date = excluded.start_date,
         end_date = excluded.end_date,
         status = excluded.status,
         scenes_selected = excluded.scenes_selected,
         quota_hectares = excluded.quota_hectares,
         record = excluded.record,
         updated_at = CURRENT_TIMESTAMP`,
      [
        order.jobId,
        order.aoiLabel,
        order.kind,
        order.batchId ?? null,
        order.startDate,
        order.endDate,
        order.status,
        order.scenesSelected ?? null,
        order.quotaHectares ?? null,
        JSON.stringify(order),
        order.createdAt,
      ],
    );
  }

  /**
   * Runs `work` inside BEGIN/COMMIT, rolling back on any failure. Units are
   * queued so that two callers never share an open transaction.
   */
  private transaction<T>(work: () => Promise<T>): Promise<T> {
    const unit = this.queue.then(async () => {
      await this.run("BEGIN");
      try {
        const result = await work();
        await this.run("COMMIT");
        return result;
      } catch (error) {
        try {
          await this.run("ROLLBACK");
        } catch (rollbackError) {
          logger.error("Rollback failed", rollbackError);
        }
        throw error;
      }
    });
    this.queue = unit.catch(() => undefined);
    return unit;
  }

  private run(sql: string, params: SqlParam[] = []): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private getRow<T>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    return new Promise((resolve, reject) => {
      this.db.get<T>(sql, params, (err, row) => {
        if (err) reject(err);
        else resolve(row);
      });
    });
  }

  private allRows<T>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    return new Promise((resolve, reject) => {
      this.db.all<T>(sql, params, (err, rows) => {
        if (err) reject(err);
        else resolve(rows || []);
      });
    });
  }
}

export default DBService;
