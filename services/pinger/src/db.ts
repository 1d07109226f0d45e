import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { sql } from 'drizzle-orm';
import {
  pgTable,
  bigserial,
  varchar,
  timestamp,
  boolean,
  doublePrecision,
  integer,
  index,
  primaryKey,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

// Append-only, one row per probe result
export const pingHistory = pgTable('ping_history', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  targetName: varchar('target_name', { length: 255 }).notNull(),
  host: varchar('host', { length: 255 }).notNull(),
  timestamp: timestamp('timestamp', { mode: 'date', withTimezone: true }).notNull(),
  success: boolean('success').notNull(),
  responseTimeMs: doublePrecision('response_time_ms'),
  errorKind: varchar('error_kind', { length: 50 }),
}, (table) => [
  index('idx_ping_history_target_timestamp').on(table.targetName, table.timestamp),
]);

// Upserted by (target_name, start_time); end_time stays null while the event is open
export const disconnectEvents = pgTable('disconnect_events', {
  targetName: varchar('target_name', { length: 255 }).notNull(),
  host: varchar('host', { length: 255 }).notNull(),
  startTime: timestamp('start_time', { mode: 'date', withTimezone: true }).notNull(),
  endTime: timestamp('end_time', { mode: 'date', withTimezone: true }),
  disconnectCount: integer('disconnect_count').notNull(),
  updatedAt: timestamp('updated_at', { mode: 'date', withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  primaryKey({ columns: [table.targetName, table.startTime] }),
]);

export const pingStatistics = pgTable('ping_statistics', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  targetName: varchar('target_name', { length: 255 }).notNull(),
  host: varchar('host', { length: 255 }).notNull(),
  totalPings: integer('total_pings').notNull(),
  successfulPings: integer('successful_pings').notNull(),
  failedPings: integer('failed_pings').notNull(),
  successRate: doublePrecision('success_rate').notNull(),
  avgResponseTime: doublePrecision('avg_response_time'),
  minResponseTime: doublePrecision('min_response_time'),
  maxResponseTime: doublePrecision('max_response_time'),
  lastStatus: varchar('last_status', { length: 10 }).notNull(),
  timestamp: timestamp('timestamp', { mode: 'date', withTimezone: true }).notNull(),
}, (table) => [
  uniqueIndex('idx_ping_statistics_target_timestamp').on(table.targetName, table.timestamp),
]);

export type PingRow = typeof pingHistory.$inferInsert;
export type DisconnectRow = typeof disconnectEvents.$inferInsert;
export type DisconnectRecord = typeof disconnectEvents.$inferSelect;
export type SnapshotRow = typeof pingStatistics.$inferInsert;
export type SnapshotRecord = typeof pingStatistics.$inferSelect;

const schema = { pingHistory, disconnectEvents, pingStatistics };

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseHandle {
  db: Database;
  close(): Promise<void>;
}

export function createDatabase(url: string): DatabaseHandle {
  const queryClient = postgres(url, { max: 5 });
  const db = drizzle(queryClient, { schema });

  return {
    db,
    close: () => queryClient.end(),
  };
}

/**
 * Create tables and indexes when they do not exist yet.
 */
export async function ensureSchema(db: Database): Promise<void> {
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS ping_history (
      id BIGSERIAL PRIMARY KEY,
      target_name VARCHAR(255) NOT NULL,
      host VARCHAR(255) NOT NULL,
      "timestamp" TIMESTAMPTZ NOT NULL,
      success BOOLEAN NOT NULL,
      response_time_ms DOUBLE PRECISION,
      error_kind VARCHAR(50)
    )
  `);
  await db.execute(sql`
    CREATE INDEX IF NOT EXISTS idx_ping_history_target_timestamp
    ON ping_history (target_name, "timestamp")
  `);
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS disconnect_events (
      target_name VARCHAR(255) NOT NULL,
      host VARCHAR(255) NOT NULL,
      start_time TIMESTAMPTZ NOT NULL,
      end_time TIMESTAMPTZ,
      disconnect_count INTEGER NOT NULL,
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      PRIMARY KEY (target_name, start_time)
    )
  `);
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS ping_statistics (
      id BIGSERIAL PRIMARY KEY,
      target_name VARCHAR(255) NOT NULL,
      host VARCHAR(255) NOT NULL,
      total_pings INTEGER NOT NULL,
      successful_pings INTEGER NOT NULL,
      failed_pings INTEGER NOT NULL,
      success_rate DOUBLE PRECISION NOT NULL,
      avg_response_time DOUBLE PRECISION,
      min_response_time DOUBLE PRECISION,
      max_response_time DOUBLE PRECISION,
      last_status VARCHAR(10) NOT NULL,
      "timestamp" TIMESTAMPTZ NOT NULL
    )
  `);
  await db.execute(sql`
    CREATE UNIQUE INDEX IF NOT EXISTS idx_ping_statistics_target_timestamp
    ON ping_statistics (target_name, "timestamp")
  `);
}
