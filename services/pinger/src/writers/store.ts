/**
 * Postgres store
 *
 * Table-level writes and reads behind an interface, so the persistence
 * writer and the HTTP layer can be exercised against an in-memory store.
 */

import { and, asc, desc, eq, gte, isNull, sql } from 'drizzle-orm';
import { disconnectEvents, pingHistory, pingStatistics } from '../db';
import type {
  Database,
  DisconnectRecord,
  DisconnectRow,
  PingRow,
  SnapshotRecord,
  SnapshotRow,
} from '../db';

export interface PersistenceStore {
  insertPings(rows: PingRow[]): Promise<void>;
  insertSnapshots(rows: SnapshotRow[]): Promise<void>;
  upsertDisconnects(rows: DisconnectRow[]): Promise<void>;
  /** Ends every event still open, at its last update; returns how many */
  closeOpenDisconnects(): Promise<number>;
}

/** Per-target aggregate over `ping_history` since a point in time */
export interface RangeSummaryRow {
  targetName: string;
  host: string;
  pings: number;
  successes: number;
  avgResponseTime: number | null;
  minResponseTime: number | null;
  maxResponseTime: number | null;
  /** Sample standard deviation of response times; null below two samples */
  jitter: number | null;
}

export interface DisconnectSummaryRow {
  targetName: string;
  host: string;
  disconnectCount: number;
  lastDisconnectAt: number;
}

export interface SeriesPointRow {
  targetName: string;
  bucketStart: number;
  avgResponseTime: number | null;
  minResponseTime: number | null;
  maxResponseTime: number | null;
}

export interface QueryStore {
  latestSnapshot(targetName: string): Promise<SnapshotRecord | null>;
  listDisconnects(targetName: string, limit: number): Promise<DisconnectRecord[]>;
  summarizeRange(since: Date): Promise<RangeSummaryRow[]>;
  summarizeDisconnects(since: Date): Promise<DisconnectSummaryRow[]>;
  responseTimeSeries(since: Date, bucketSeconds: number): Promise<SeriesPointRow[]>;
}

export class PostgresStore implements PersistenceStore, QueryStore {
  private db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  async insertPings(rows: PingRow[]): Promise<void> {
    if (rows.length === 0) return;
    await this.db.insert(pingHistory).values(rows);
  }

  async insertSnapshots(rows: SnapshotRow[]): Promise<void> {
    if (rows.length === 0) return;
    // A retried batch may contain snapshots that already landed
    await this.db.insert(pingStatistics).values(rows).onConflictDoNothing();
  }

  async upsertDisconnects(rows: DisconnectRow[]): Promise<void> {
    if (rows.length === 0) return;

    await this.db
      .insert(disconnectEvents)
      .values(rows)
      .onConflictDoUpdate({
        target: [disconnectEvents.targetName, disconnectEvents.startTime],
        set: {
          host: sql`excluded.host`,
          // A replayed open row must not reopen a closed event
          endTime: sql`COALESCE(excluded.end_time, ${disconnectEvents.endTime})`,
          disconnectCount: sql`GREATEST(${disconnectEvents.disconnectCount}, excluded.disconnect_count)`,
          updatedAt: new Date(),
        },
      });
  }

  async closeOpenDisconnects(): Promise<number> {
    const closed = await this.db
      .update(disconnectEvents)
      .set({
        endTime: sql`GREATEST(${disconnectEvents.updatedAt}, ${disconnectEvents.startTime})`,
        updatedAt: new Date(),
      })
      .where(isNull(disconnectEvents.endTime))
      .returning({ targetName: disconnectEvents.targetName });

    return closed.length;
  }

  async latestSnapshot(targetName: string): Promise<SnapshotRecord | null> {
    const rows = await this.db
      .select()
      .from(pingStatistics)
      .where(eq(pingStatistics.targetName, targetName))
      .orderBy(desc(pingStatistics.timestamp))
      .limit(1);

    return rows[0] ?? null;
  }

  async listDisconnects(targetName: string, limit: number): Promise<DisconnectRecord[]> {
    return this.db
      .select()
      .from(disconnectEvents)
      .where(eq(disconnectEvents.targetName, targetName))
      .orderBy(desc(disconnectEvents.startTime))
      .limit(limit);
  }

  async summarizeRange(since: Date): Promise<RangeSummaryRow[]> {
    return this.db
      .select({
        targetName: pingHistory.targetName,
        host: sql<string>`MAX(${pingHistory.host})`,
        pings: sql<number>`COUNT(*)::int`,
        successes: sql<number>`COUNT(*) FILTER (WHERE ${pingHistory.success})::int`,
        avgResponseTime: sql<number | null>`AVG(${pingHistory.responseTimeMs})`,
        minResponseTime: sql<number | null>`MIN(${pingHistory.responseTimeMs})`,
        maxResponseTime: sql<number | null>`MAX(${pingHistory.responseTimeMs})`,
        jitter: sql<number | null>`STDDEV_SAMP(${pingHistory.responseTimeMs})`,
      })
      .from(pingHistory)
      .where(gte(pingHistory.timestamp, since))
      .groupBy(pingHistory.targetName)
      .orderBy(asc(pingHistory.targetName));
  }

  async summarizeDisconnects(since: Date): Promise<DisconnectSummaryRow[]> {
    return this.db
      .select({
        targetName: disconnectEvents.targetName,
        host: sql<string>`MAX(${disconnectEvents.host})`,
        disconnectCount: sql<number>`COUNT(*)::int`,
        lastDisconnectAt: sql<number>`(EXTRACT(EPOCH FROM MAX(${disconnectEvents.startTime})) * 1000)::float8`,
      })
      .from(disconnectEvents)
      .where(gte(disconnectEvents.startTime, since))
      .groupBy(disconnectEvents.targetName)
      .orderBy(asc(disconnectEvents.targetName));
  }

  async responseTimeSeries(since: Date, bucketSeconds: number): Promise<SeriesPointRow[]> {
    if (!Number.isInteger(bucketSeconds) || bucketSeconds <= 0) {
      throw new Error(`Invalid bucket width: ${bucketSeconds}`);
    }

    // Inlined so the grouped and selected expressions render identically
    const width = sql.raw(String(bucketSeconds));
    const bucket = sql`FLOOR(EXTRACT(EPOCH FROM ${pingHistory.timestamp}) / ${width})`;

    return this.db
      .select({
        targetName: pingHistory.targetName,
        bucketStart: sql<number>`(${bucket} * ${width} * 1000)::float8`,
        avgResponseTime: sql<number | null>`AVG(${pingHistory.responseTimeMs})`,
        minResponseTime: sql<number | null>`MIN(${pingHistory.responseTimeMs})`,
        maxResponseTime: sql<number | null>`MAX(${pingHistory.responseTimeMs})`,
      })
      .from(pingHistory)
      .where(and(gte(pingHistory.timestamp, since), eq(pingHistory.success, true)))
      .groupBy(pingHistory.targetName, bucket)
      .orderBy(asc(pingHistory.targetName), bucket);
  }
}
