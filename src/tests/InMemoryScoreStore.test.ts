// src/tests/InMemoryScoreStore.test.ts
import { InMemoryScoreStore } from '../services/store/InMemoryScoreStore';

describe('InMemoryScoreStore', () => {
  let store: InMemoryScoreStore;

  beforeEach(() => {
    store = new InMemoryScoreStore();
  });

  it('should return the same record for the same natural key', async () => {
    const [first, second] = await store.transaction(async (tx) => [
      await tx.hosts.upsert({ name: 'Arcadia HS', city: null, state: null }),
      await tx.hosts.upsert({ name: 'Arcadia HS', city: null, state: null })
    ]);

    expect(second.id).toBe(first.id);
    expect(store.dump().hosts).toHaveLength(1);
  });

  it('should treat hosts with different locations as different', async () => {
    await store.transaction(async (tx) => {
      await tx.hosts.upsert({ name: 'Arcadia HS', city: 'Arcadia', state: 'CA' });
      await tx.hosts.upsert({ name: 'Arcadia HS', city: null, state: null });
    });

    expect(store.dump().hosts).toHaveLength(2);
  });

  it('should overwrite a group classification on upsert', async () => {
    const group = await store.transaction(async (tx) => {
      await tx.groups.upsert('Pulse', 'Irvine', 1);
      return tx.groups.upsert('Pulse', 'Irvine', 2);
    });

    expect(group.classificationId).toBe(2);
    expect(store.dump().groups).toEqual([{ id: group.id, name: 'Pulse', homeCity: 'Irvine', classificationId: 2 }]);
  });

  it('should restore every table when the transaction fails', async () => {
    await store.transaction((tx) => tx.seasons.upsertByYear(2024));

    await expect(
      store.transaction(async (tx) => {
        await tx.seasons.upsertByYear(2025);
        await tx.classifications.upsertByName('Unknown');
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    const tables = store.dump();
    expect(tables.seasons.map((s) => s.year)).toEqual([2024]);
    expect(tables.classifications).toEqual([]);
  });

  it('should delete caption scores with their performances', async () => {
    const removed = await store.transaction(async (tx) => {
      const performance = await tx.performances.insert({
        showId: 1,
        groupId: 1,
        classificationId: null,
        blockNumber: null,
        totalScore: 39,
        placement: 1,
        penalty: 0
      });
      await tx.captionScores.insert({
        performanceId: performance.id,
        caption: 'Visual',
        weight: 20,
        compScore: 20,
        perfScore: 19,
        placement: 1,
        judgeId: null
      });
      return tx.performances.deleteForShow(1);
    });

    expect(removed).toBe(1);
    expect(store.dump().captionScores).toEqual([]);
  });

  it('should run transactions one at a time', async () => {
    const order: string[] = [];
    const slow = store.transaction(async () => {
      order.push('slow:start');
      await new Promise((resolve) => setTimeout(resolve, 10));
      order.push('slow:end');
    });
    const fast = store.transaction(async () => {
      order.push('fast');
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(['slow:start', 'slow:end', 'fast']);
  });
});
