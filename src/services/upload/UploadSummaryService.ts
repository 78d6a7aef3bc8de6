import { differenceInCalendarDays } from 'date-fns';
import { SheetCounts } from '../../domain/upload/sheets';
import { Player } from '../../domain/player/Player';
import { Executor } from '../../infrastructure/persistence/client';
import { Repositories, createRepositories } from '../../infrastructure/repositories';
import { NotFoundError } from '../../shared/errors';
import { parseColorTag } from '../../shared/utilities/colorTags';
import { formatPeriod } from '../../shared/utilities/period';

/** Participation points a player needs each month */
export const REQUIRED_PAP = 3;
/** Players below this income are exempt from the fine */
export const FINE_INCOME_THRESHOLD = 1_000_000_000;
/** Players who joined fewer days than this before the month are protected */
export const NEW_PLAYER_PROTECTION_DAYS = 90;

export const PlayerStatus = {
  QUALIFIED: '合格',
  NEW_PLAYER: '新人保护',
  LOW_INCOME: '低收入豁免',
} as const;

export interface PlayerSummary {
  playerId: number;
  /** Title as stored, colour markup included */
  playerTitle: string;
  titleText: string;
  titleColor: string | null;
  mainCharacter: string | null;
  totalPap: number;
  strategicPap: number;
  totalTax: number;
  totalMiningVolume: number;
  totalIncome: number;
  status: string;
}

export interface UploadSummary {
  year: number;
  month: number;
  uploadedAt: Date;
  uploadedBy: string;
  taxRate: number;
  oreConvertRate: number;
  counts: SheetCounts;
  players: PlayerSummary[];
}

export interface StatusInput {
  totalPap: number;
  totalIncome: number;
  joinDate: Date | null;
}

/**
 * Monthly status of one player
 */
export function playerStatus(input: StatusInput, year: number, month: number): string {
  if (input.totalPap >= REQUIRED_PAP) {
    return PlayerStatus.QUALIFIED;
  }

  const firstOfMonth = new Date(year, month - 1, 1);
  if (input.joinDate && differenceInCalendarDays(firstOfMonth, input.joinDate) < NEW_PLAYER_PROTECTION_DAYS) {
    return PlayerStatus.NEW_PLAYER;
  }

  if (input.totalIncome >= FINE_INCOME_THRESHOLD) {
    return `罚款：${Number((REQUIRED_PAP - input.totalPap).toFixed(2))}`;
  }
  return PlayerStatus.LOW_INCOME;
}

export function totalIncome(totalTax: number, totalMiningVolume: number, taxRate: number, oreConvertRate: number) {
  const taxIncome = taxRate > 0 ? totalTax / taxRate : 0;
  return taxIncome + totalMiningVolume * oreConvertRate;
}

/**
 * Per-player totals of one monthly upload
 */
export class UploadSummaryService {
  constructor(private readonly db: Executor) {}

  getUploadSummary(year: number, month: number): UploadSummary {
    const repositories = createRepositories(this.db);
    const upload = repositories.uploads.getByPeriod(year, month);
    if (!upload) {
      throw new NotFoundError(`No upload for ${formatPeriod({ year, month })}`, { year, month });
    }

    const totals = repositories.records.getTotalsByCharacter(upload.id);
    const characters = new Map(
      repositories.characters.getByIds(totals.map(total => total.characterId)).map(c => [c.id, c])
    );

    const byPlayer = new Map<number, PlayerSummary>();
    const players = new Map<number, Player>();
    for (const total of totals) {
      const character = characters.get(total.characterId);
      const player = character ? this.loadPlayer(repositories, players, character.playerId) : null;
      if (!player) {
        continue;
      }

      let summary = byPlayer.get(player.id);
      if (!summary) {
        summary = this.emptySummary(repositories, player);
        byPlayer.set(player.id, summary);
      }
      summary.totalPap += total.points;
      summary.strategicPap += total.strategicPoints;
      summary.totalTax += total.taxIsk;
      summary.totalMiningVolume += total.volumeM3;
    }

    const summaries = [...byPlayer.values()].map(summary => {
      const income = totalIncome(summary.totalTax, summary.totalMiningVolume, upload.taxRate, upload.oreConvertRate);
      const joinDate = players.get(summary.playerId)?.joinDate ?? null;
      return {
        ...summary,
        totalIncome: income,
        status: playerStatus({ totalPap: summary.totalPap, totalIncome: income, joinDate }, year, month),
      };
    });
    summaries.sort((a, b) => b.totalPap - a.totalPap);

    return {
      year: upload.year,
      month: upload.month,
      uploadedAt: upload.uploadedAt,
      uploadedBy: upload.uploadedBy,
      taxRate: upload.taxRate,
      oreConvertRate: upload.oreConvertRate,
      counts: repositories.records.countByUpload(upload.id),
      players: summaries,
    };
  }

  private loadPlayer(repositories: Repositories, cache: Map<number, Player>, playerId: number): Player | null {
    const cached = cache.get(playerId);
    if (cached) {
      return cached;
    }
    const player = repositories.players.getById(playerId);
    if (player) {
      cache.set(playerId, player);
    }
    return player;
  }

  private emptySummary(repositories: Repositories, player: Player): PlayerSummary {
    const { text, color } = parseColorTag(player.title);
    const main = player.mainCharacterId === null ? null : repositories.characters.getById(player.mainCharacterId);
    return {
      playerId: player.id,
      playerTitle: player.title,
      titleText: text,
      titleColor: color,
      mainCharacter: main?.name ?? null,
      totalPap: 0,
      strategicPap: 0,
      totalTax: 0,
      totalMiningVolume: 0,
      totalIncome: 0,
      status: '',
    };
  }
}
