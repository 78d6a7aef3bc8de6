import { UnifiedESIClient } from '../../../../src/infrastructure/http/UnifiedESIClient';
import { NoopRateLimiter } from '../../../../src/shared/performance';
import { StubResponse, stubAdapter } from '../../../helpers/axiosAdapter';

const CORPORATION_ID = 98000001;

function createClient(handlers: Record<string, StubResponse | StubResponse[]>) {
  const stub = stubAdapter(handlers);
  const sleep = jest.fn((_ms: number) => Promise.resolve());
  const client = new UnifiedESIClient({
    esiBaseUrl: 'https://esi.test',
    imageBaseUrl: 'https://images.test',
    zkillboardBaseUrl: 'https://zkill.test',
    userAgent: 'test-agent',
    corporationId: CORPORATION_ID,
    maxAttempts: 3,
    initialRetryDelay: 10,
    maxRetryDelay: 100,
    rateLimitedWaitMs: 60000,
    rateLimiter: new NoopRateLimiter(),
    sleep,
    adapter: stub.adapter,
  });
  return { client, sleep, ...stub };
}

describe('UnifiedESIClient', () => {
  describe('searchCharacterId', () => {
    it('should post the name and return the matched id', async () => {
      const { client, requests } = createClient({
        'POST /universe/ids/': { status: 200, data: { characters: [{ id: 12345, name: 'Alice' }] } },
      });

      const result = await client.searchCharacterId('Alice');

      expect(result).toEqual({ ok: true, value: 12345 });
      expect(requests[0].data).toBe('["Alice"]');
      expect(requests[0].headers['User-Agent']).toBe('test-agent');
    });

    it('should return null when ESI knows no such character', async () => {
      const { client } = createClient({ 'POST /universe/ids/': { status: 200, data: {} } });

      await expect(client.searchCharacterId('Nobody')).resolves.toEqual({ ok: true, value: null });
    });

    it('should wait the rate-limit delay after a 420 and try again', async () => {
      const { client, sleep, calls } = createClient({
        'POST /universe/ids/': [{ status: 420 }, { status: 200, data: { characters: [{ id: 7, name: 'Bob' }] } }],
      });

      const result = await client.searchCharacterId('Bob');

      expect(result).toEqual({ ok: true, value: 7 });
      expect(calls).toHaveLength(2);
      expect(sleep).toHaveBeenCalledWith(60000);
    });

    it('should report a failure once 429 retries are exhausted', async () => {
      const { client, calls } = createClient({ 'POST /universe/ids/': { status: 429 } });

      const result = await client.searchCharacterId('Bob');

      expect(calls).toHaveLength(3);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.isRateLimited).toBe(true);
        expect(result.error.responseStatus).toBe(429);
      }
    });

    it('should back off exponentially on server errors', async () => {
      const { client, sleep } = createClient({
        'POST /universe/ids/': [{ status: 503 }, { status: 502 }, { status: 200, data: { characters: [] } }],
      });

      await expect(client.searchCharacterId('Carol')).resolves.toEqual({ ok: true, value: null });
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([10, 20]);
    });

    it('should retry a malformed payload with backoff', async () => {
      const { client, calls, sleep } = createClient({
        'POST /universe/ids/': [
          { status: 200, data: { characters: 'unexpected' } },
          { status: 200, data: { characters: [{ id: 12345, name: 'Dave' }] } },
        ],
      });

      await expect(client.searchCharacterId('Dave')).resolves.toEqual({ ok: true, value: 12345 });
      expect(calls).toHaveLength(2);
      expect(sleep).toHaveBeenCalledWith(10);
    });

    it('should report a failure once a malformed payload keeps coming back', async () => {
      const { client, calls } = createClient({
        'POST /universe/ids/': { status: 200, data: { characters: 'unexpected' } },
      });

      const result = await client.searchCharacterId('Dave');

      expect(result.ok).toBe(false);
      expect(calls).toHaveLength(3);
    });
  });

  describe('lookupIdByName', () => {
    it('should find the id once a malformed answer is followed by a valid one', async () => {
      const { client, calls } = createClient({
        'POST /universe/ids/': [
          { status: 200, data: { characters: 'garbage' } },
          { status: 200, data: { characters: [{ id: 12345, name: 'Alice' }] } },
        ],
      });

      await expect(client.lookupIdByName('Alice')).resolves.toBe(12345);
      expect(calls).toHaveLength(2);
    });

    it('should degrade failures to null', async () => {
      const { client, calls } = createClient({ 'POST /universe/ids/': { status: 404 } });

      await expect(client.lookupIdByName('Eve')).resolves.toBeNull();
      expect(calls).toHaveLength(1);
    });
  });

  describe('fetchCharacter', () => {
    it('should combine character details with the earliest join of the corporation', async () => {
      const { client } = createClient({
        'GET /characters/12345/': {
          status: 200,
          data: { name: 'Alice', corporation_id: CORPORATION_ID, title: ' Wing Commander ' },
        },
        'GET /characters/12345/corporationhistory/': {
          status: 200,
          data: [
            { corporation_id: CORPORATION_ID, record_id: 20, start_date: '2024-05-01T00:00:00Z' },
            { corporation_id: CORPORATION_ID, record_id: 10, start_date: '2023-01-15T00:00:00Z' },
            { corporation_id: 1000, record_id: 5, start_date: '2020-01-01T00:00:00Z' },
          ],
        },
      });

      const details = await client.fetchCharacter(12345);

      expect(details).toEqual({
        id: 12345,
        name: 'Alice',
        title: 'Wing Commander',
        joinDate: new Date('2023-01-15T00:00:00Z'),
      });
    });

    it('should leave title and join date empty when unknown', async () => {
      const { client } = createClient({
        'GET /characters/1/': { status: 200, data: { name: 'Frank', corporation_id: 1000, title: '  ' } },
        'GET /characters/1/corporationhistory/': { status: 200, data: [] },
      });

      await expect(client.fetchCharacter(1)).resolves.toEqual({ id: 1, name: 'Frank', title: null, joinDate: null });
    });

    it('should return null when the corporation history cannot be read', async () => {
      const { client, calls } = createClient({
        'GET /characters/3/': { status: 200, data: { name: 'Grace', corporation_id: CORPORATION_ID, title: 'Pilot' } },
        'GET /characters/3/corporationhistory/': { status: 503 },
      });

      await expect(client.fetchCharacter(3)).resolves.toBeNull();
      expect(calls).toEqual([
        'GET /characters/3/',
        'GET /characters/3/corporationhistory/',
        'GET /characters/3/corporationhistory/',
        'GET /characters/3/corporationhistory/',
      ]);
    });

    it('should return null when the character cannot be read', async () => {
      const { client } = createClient({ 'GET /characters/2/': { status: 404 } });

      await expect(client.fetchCharacter(2)).resolves.toBeNull();
    });
  });

  describe('lookupAllianceId', () => {
    it('should return the alliance id', async () => {
      const { client } = createClient({ 'GET /corporations/1/': { status: 200, data: { alliance_id: 99 } } });
      await expect(client.lookupAllianceId(1)).resolves.toBe(99);
    });

    it('should return 0 for a corporation outside any alliance', async () => {
      const { client } = createClient({ 'GET /corporations/1/': { status: 200, data: { name: 'Corp' } } });
      await expect(client.lookupAllianceId(1)).resolves.toBe(0);
    });
  });

  describe('fetchCorporationLogo', () => {
    it('should return the image bytes', async () => {
      const { client, calls } = createClient({
        'GET /corporations/1/logo?size=64': { status: 200, data: Buffer.from([1, 2, 3]) },
      });

      const logo = await client.fetchCorporationLogo(1, 64);

      expect(calls).toEqual(['GET /corporations/1/logo?size=64']);
      expect(logo?.equals(Buffer.from([1, 2, 3]))).toBe(true);
    });
  });

  describe('fetchKillmailValue', () => {
    it('should return the total value', async () => {
      const { client } = createClient({
        'GET /killID/5/': { status: 200, data: [{ killmail_id: 5, zkb: { totalValue: 1500.5 } }] },
      });
      await expect(client.fetchKillmailValue(5)).resolves.toBe(1500.5);
    });

    it('should return null for an unknown killmail', async () => {
      const { client } = createClient({ 'GET /killID/6/': { status: 200, data: [] } });
      await expect(client.fetchKillmailValue(6)).resolves.toBeNull();
    });

    it('should throw once malformed payloads exhaust its retry budget', async () => {
      const { client, calls } = createClient({ 'GET /killID/8/': { status: 200, data: { unexpected: true } } });

      await expect(client.fetchKillmailValue(8)).rejects.toThrow('Invalid response from ZKILL /killID/8/');
      expect(calls).toHaveLength(5);
    });

    it('should throw after its own retry budget is spent', async () => {
      const { client, calls } = createClient({ 'GET /killID/7/': { status: 503 } });

      await expect(client.fetchKillmailValue(7)).rejects.toThrow('ZKILL request to /killID/7/ failed with status 503');
      expect(calls).toHaveLength(5);
    });
  });
});
