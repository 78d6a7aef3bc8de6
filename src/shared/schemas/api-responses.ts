/**
 * API response validation schemas
 * Only the fields the service reads are declared; everything else passes through.
 */

import { z } from 'zod';

/**
 * ESI schemas
 */
export const ESIUniverseIdsSchema = z
  .object({
    characters: z.array(z.object({ id: z.number().int(), name: z.string() })).optional(),
  })
  .passthrough();

export const ESICharacterSchema = z
  .object({
    name: z.string(),
    corporation_id: z.number().int(),
    title: z.string().optional(),
    birthday: z.string().optional(),
  })
  .passthrough();

export const ESICorporationHistorySchema = z.array(
  z
    .object({
      corporation_id: z.number().int(),
      record_id: z.number().int(),
      start_date: z.string(),
      is_deleted: z.boolean().optional(),
    })
    .passthrough()
);

export const ESICorporationSchema = z
  .object({
    name: z.string().optional(),
    ticker: z.string().optional(),
    alliance_id: z.number().int().optional(),
  })
  .passthrough();

/**
 * zKillboard schemas
 */
export const ZkillKillmailListSchema = z.array(
  z
    .object({
      killmail_id: z.number().int(),
      zkb: z
        .object({
          totalValue: z.number(),
        })
        .passthrough(),
    })
    .passthrough()
);

export type ESIUniverseIds = z.infer<typeof ESIUniverseIdsSchema>;
export type ESICharacter = z.infer<typeof ESICharacterSchema>;
export type ESICorporationHistory = z.infer<typeof ESICorporationHistorySchema>;
export type ESICorporation = z.infer<typeof ESICorporationSchema>;
export type ZkillKillmailList = z.infer<typeof ZkillKillmailListSchema>;
