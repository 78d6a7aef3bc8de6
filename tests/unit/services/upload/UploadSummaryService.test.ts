import { DatabaseClient } from '../../../../src/infrastructure/persistence/client';
import { Repositories } from '../../../../src/infrastructure/repositories';
import { PlayerAggregator } from '../../../../src/services/identity/PlayerAggregator';
import {
  PlayerStatus,
  UploadSummaryService,
  playerStatus,
  totalIncome,
} from '../../../../src/services/upload/UploadSummaryService';
import { NotFoundError } from '../../../../src/shared/errors';
import { createTestDatabase } from '../../../helpers/database';

describe('playerStatus', () => {
  const veteran = new Date(2020, 0, 1);

  it('should qualify players with enough points', () => {
    expect(playerStatus({ totalPap: 3, totalIncome: 0, joinDate: null }, 2025, 7)).toBe(PlayerStatus.QUALIFIED);
  });

  it('should protect players who joined less than 90 days before the month', () => {
    expect(playerStatus({ totalPap: 0, totalIncome: 5e9, joinDate: new Date(2025, 5, 1) }, 2025, 7)).toBe(
      PlayerStatus.NEW_PLAYER
    );
    expect(playerStatus({ totalPap: 0, totalIncome: 5e9, joinDate: new Date(2025, 3, 2) }, 2025, 7)).toBe('罚款：3');
  });

  it('should fine the missing points of high earners', () => {
    expect(playerStatus({ totalPap: 0.5, totalIncome: 1e9, joinDate: veteran }, 2025, 7)).toBe('罚款：2.5');
    expect(playerStatus({ totalPap: 2.9, totalIncome: 2e9, joinDate: null }, 2025, 7)).toBe('罚款：0.1');
  });

  it('should exempt low earners', () => {
    expect(playerStatus({ totalPap: 1, totalIncome: 999_999_999, joinDate: veteran }, 2025, 7)).toBe(
      PlayerStatus.LOW_INCOME
    );
  });
});

describe('totalIncome', () => {
  it('should convert tax back to income and add mined volume', () => {
    expect(totalIncome(50, 10, 0.5, 100)).toBe(1100);
  });

  it('should ignore tax when the rate is zero', () => {
    expect(totalIncome(50, 2, 0, 3)).toBe(6);
  });
});

describe('UploadSummaryService', () => {
  let client: DatabaseClient;
  let repositories: Repositories;
  let service: UploadSummaryService;

  beforeEach(() => {
    ({ client, repositories } = createTestDatabase());
    service = new UploadSummaryService(client.db);
  });

  afterEach(() => {
    client.close();
  });

  it('should total each player and sort by points', () => {
    const lead = repositories.players.create('<color=0xFF00FF00>Fleet Lead</color>');
    const miner = repositories.players.create('Miner Boss');
    repositories.characters.create({ id: 1, name: 'Alice', title: null, joinDate: new Date(2023, 0, 1), playerId: lead.id });
    repositories.characters.create({ id: 2, name: 'AliceAlt', title: null, joinDate: null, playerId: lead.id });
    repositories.characters.create({ id: 3, name: 'Bob', title: null, joinDate: new Date(2025, 5, 15), playerId: miner.id });
    new PlayerAggregator(repositories.players, repositories.characters).recomputeMany([lead.id, miner.id]);

    const uploadId = repositories.uploads.create({
      year: 2025,
      month: 7,
      taxRate: 0.5,
      oreConvertRate: 100,
      uploadedBy: 'tester',
    }).id;
    const activity = (characterId: number, points: number, strategicPoints: number) =>
      repositories.records.insertActivity({ uploadId, characterId, rawName: 'x', rawTitle: null, points, strategicPoints });
    activity(3, 1, 0);
    activity(1, 2, 1);
    activity(2, 1.5, 0);
    repositories.records.insertBounty({ uploadId, characterId: 1, rawName: 'Alice', taxIsk: 500 });
    repositories.records.insertMining({ uploadId, characterId: 3, rawName: 'Bob', volumeM3: 20 });

    const summary = service.getUploadSummary(2025, 7);

    expect(summary.counts).toEqual({ activity: 3, bounty: 1, mining: 1 });
    expect(summary.uploadedBy).toBe('tester');
    expect(summary.players).toEqual([
      {
        playerId: lead.id,
        playerTitle: '<color=0xFF00FF00>Fleet Lead</color>',
        titleText: 'Fleet Lead',
        titleColor: '#00FF00',
        mainCharacter: 'Alice',
        totalPap: 3.5,
        strategicPap: 1,
        totalTax: 500,
        totalMiningVolume: 0,
        totalIncome: 1000,
        status: PlayerStatus.QUALIFIED,
      },
      {
        playerId: miner.id,
        playerTitle: 'Miner Boss',
        titleText: 'Miner Boss',
        titleColor: null,
        mainCharacter: 'Bob',
        totalPap: 1,
        strategicPap: 0,
        totalTax: 0,
        totalMiningVolume: 20,
        totalIncome: 2000,
        status: PlayerStatus.NEW_PLAYER,
      },
    ]);
  });

  it('should fail for a month without upload', () => {
    expect(() => service.getUploadSummary(2025, 8)).toThrow(NotFoundError);
    expect(() => service.getUploadSummary(2025, 8)).toThrow('No upload for 2025-08');
  });
});
