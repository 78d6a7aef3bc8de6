import { integer, real, sqliteTable, text } from 'drizzle-orm/sqlite-core';
import { PlayerKind } from '../../shared/enums';

/**
 * Table definitions for query building. DDL lives in sql/schema.sql.
 */

export const players = sqliteTable('players', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title').notNull(),
  kind: text('kind', { enum: [PlayerKind.REGULAR, PlayerKind.SENTINEL] })
    .notNull()
    .default(PlayerKind.REGULAR),
  joinDate: integer('join_date', { mode: 'timestamp_ms' }),
  mainCharacterId: integer('main_character_id'),
});

export const characters = sqliteTable('characters', {
  id: integer('id').primaryKey(),
  name: text('name').notNull(),
  /** Lowercased name, see foldName */
  nameKey: text('name_key').notNull(),
  title: text('title'),
  joinDate: integer('join_date', { mode: 'timestamp_ms' }),
  playerId: integer('player_id')
    .notNull()
    .references(() => players.id, { onDelete: 'cascade' }),
  insertionSeq: integer('insertion_seq').notNull(),
});

export const monthlyUploads = sqliteTable('monthly_uploads', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  year: integer('year').notNull(),
  month: integer('month').notNull(),
  uploadedAt: integer('uploaded_at', { mode: 'timestamp_ms' }).notNull(),
  taxRate: real('tax_rate').notNull(),
  oreConvertRate: real('ore_convert_rate').notNull(),
  uploadedBy: text('uploaded_by').notNull(),
});

export const activityRecords = sqliteTable('activity_records', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  uploadId: integer('upload_id')
    .notNull()
    .references(() => monthlyUploads.id, { onDelete: 'cascade' }),
  characterId: integer('character_id')
    .notNull()
    .references(() => characters.id),
  rawName: text('raw_name').notNull(),
  rawTitle: text('raw_title'),
  points: real('points').notNull().default(0),
  strategicPoints: real('strategic_points').notNull().default(0),
});

export const bountyRecords = sqliteTable('bounty_records', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  uploadId: integer('upload_id')
    .notNull()
    .references(() => monthlyUploads.id, { onDelete: 'cascade' }),
  characterId: integer('character_id')
    .notNull()
    .references(() => characters.id),
  rawName: text('raw_name').notNull(),
  taxIsk: real('tax_isk').notNull(),
});

export const miningRecords = sqliteTable('mining_records', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  uploadId: integer('upload_id')
    .notNull()
    .references(() => monthlyUploads.id, { onDelete: 'cascade' }),
  characterId: integer('character_id')
    .notNull()
    .references(() => characters.id),
  rawName: text('raw_name').notNull(),
  volumeM3: real('volume_m3').notNull(),
});

export const systemState = sqliteTable('system_state', {
  key: text('key').primaryKey(),
  dateValue: text('date_value'),
});

export const idSequences = sqliteTable('id_sequences', {
  name: text('name').primaryKey(),
  value: integer('value').notNull(),
});

export type PlayerRow = typeof players.$inferSelect;
export type CharacterRow = typeof characters.$inferSelect;
export type MonthlyUploadRow = typeof monthlyUploads.$inferSelect;
export type ActivityRecordRow = typeof activityRecords.$inferSelect;
export type BountyRecordRow = typeof bountyRecords.$inferSelect;
export type MiningRecordRow = typeof miningRecords.$inferSelect;
export type NewActivityRecord = typeof activityRecords.$inferInsert;
export type NewBountyRecord = typeof bountyRecords.$inferInsert;
export type NewMiningRecord = typeof miningRecords.$inferInsert;
