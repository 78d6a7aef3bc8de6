import { DatabaseClient, IN_MEMORY } from '../../src/infrastructure/persistence/client';
import { Repositories, createRepositories } from '../../src/infrastructure/repositories';
import { ensureSentinel } from '../../src/services/identity/sentinel';

export interface TestDatabase {
  client: DatabaseClient;
  repositories: Repositories;
}

/**
 * Fresh in-memory database with the schema applied and the sentinel player provisioned
 */
export function createTestDatabase(): TestDatabase {
  const client = DatabaseClient.open({ path: IN_MEMORY, sessionPoolSize: 3 });
  const repositories = createRepositories(client.db);
  ensureSentinel(repositories.players);
  return { client, repositories };
}
