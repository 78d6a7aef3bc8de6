import { ValidatedConfiguration } from '../config';
import { createLogger } from '../lib/logger';
import { IESIClient, UnifiedESIClient } from '../infrastructure/http';
import { DatabaseClient, DatabaseClientOptions } from '../infrastructure/persistence/client';
import { PlayerService } from '../services/PlayerService';
import { SystemStateService } from '../services/SystemStateService';
import { ReconciliationScheduler, ReconciliationSweeper } from '../services/reconciliation';
import { MonthlyUploadService } from '../services/upload/MonthlyUploadService';
import { UploadSummaryService } from '../services/upload/UploadSummaryService';
import { TimerManager, timerManager } from '../shared/performance';

const logger = createLogger('service-container');

export interface ServiceContainerOptions {
  database?: DatabaseClientOptions;
  /** Replaces the network client, mostly for tests */
  esi?: IESIClient;
  retryDelayMs?: number;
  timerManager?: TimerManager;
}

/**
 * Wires the database, the ESI client and every service on top of them.
 * CLI commands and the REST server each own one container.
 */
export class ServiceContainer {
  readonly esi: IESIClient;
  readonly sweeper: ReconciliationSweeper;
  readonly scheduler: ReconciliationScheduler;
  readonly uploads: MonthlyUploadService;
  readonly summaries: UploadSummaryService;
  readonly players: PlayerService;
  readonly systemState: SystemStateService;

  private constructor(
    readonly database: DatabaseClient,
    options: ServiceContainerOptions
  ) {
    this.esi = options.esi ?? new UnifiedESIClient();
    this.sweeper = new ReconciliationSweeper(database.db, this.esi);
    this.scheduler = new ReconciliationScheduler(
      this.sweeper,
      options.retryDelayMs ?? ValidatedConfiguration.reconciliation.retryDelayMs,
      options.timerManager ?? timerManager
    );
    this.uploads = new MonthlyUploadService(database, this.sweeper, this.scheduler);
    this.summaries = new UploadSummaryService(database.db);
    this.players = new PlayerService(database.db);
    this.systemState = new SystemStateService(database.db);
  }

  static create(options: ServiceContainerOptions = {}): ServiceContainer {
    const database = DatabaseClient.open(options.database);
    const container = new ServiceContainer(database, options);
    container.players.ensureSentinel();
    logger.debug('Service container ready');
    return container;
  }

  /**
   * Cancel waiting sweeps, let running ones finish, then close the database
   */
  async close(): Promise<void> {
    this.scheduler.cancelAll();
    await this.scheduler.drain();
    this.database.close();
    logger.debug('Service container closed');
  }
}
