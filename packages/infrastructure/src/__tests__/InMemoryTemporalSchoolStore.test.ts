import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { isErr, isOk, type Result } from '@schoolreg/core';
import { MAX_VALID_TO } from '@schoolreg/domain';

import { InMemoryTemporalSchoolStore } from '../repositories/InMemoryTemporalSchoolStore.js';
import {
  InMemorySchoolCommandRepository,
  InMemorySchoolQueryRepository,
} from '../repositories/InMemorySchoolRepositories.js';

function okValue<T, E>(result: Result<T, E>): T {
  if (isErr(result)) throw result.error;
  return result.value;
}

const DAY = 24 * 60 * 60 * 1000;
const T0 = new Date('2024-03-01T08:00:00.000Z');

function at(offsetMs: number): Date {
  return new Date(T0.getTime() + offsetMs);
}

/**
 * Store whose clock returns `now`, which tests move by hand
 */
function createFixture() {
  const clock = { now: T0 };
  const store = new InMemoryTemporalSchoolStore({ clock: () => new Date(clock.now) });
  return {
    clock,
    store,
    commands: new InMemorySchoolCommandRepository(store),
    queries: new InMemorySchoolQueryRepository(store),
  };
}

const schoolA = { name: 'A', address: '1 Elm Street', principalName: 'Ada Park', createdAt: T0 };

describe('InMemoryTemporalSchoolStore', () => {
  it('should assign increasing ids and open an unbounded period', () => {
    const { store } = createFixture();

    const first = store.insert(schoolA);
    const second = store.insert({ ...schoolA, name: 'B' });

    expect(first.id).toBe(1);
    expect(second.id).toBe(2);
    expect(first.version).toBe(1);
    expect(first.validFrom.getTime()).toBe(T0.getTime());
    expect(first.validTo.getTime()).toBe(MAX_VALID_TO.getTime());
  });

  it('should close the old version at the instant the new one opens', () => {
    const { clock, store } = createFixture();
    const inserted = store.insert(schoolA);

    clock.now = at(5 * DAY);
    store.replace({ id: inserted.id, name: 'B', address: schoolA.address, principalName: 'Ada Park' });

    const [previous, current] = store.versionsOf(inserted.id);
    expect(previous?.name).toBe('A');
    expect(previous?.validTo.getTime()).toBe(at(5 * DAY).getTime());
    expect(current?.name).toBe('B');
    expect(current?.validFrom.getTime()).toBe(at(5 * DAY).getTime());
    expect(current?.version).toBe(2);
  });

  it('should keep id and creation time across versions', () => {
    const { clock, store } = createFixture();
    const inserted = store.insert(schoolA);

    clock.now = at(DAY);
    const updated = store.replace({ id: inserted.id, name: 'B', address: 'X', principalName: 'Y' });

    expect(updated?.id).toBe(inserted.id);
    expect(updated?.createdAt.getTime()).toBe(T0.getTime());
  });

  it('should advance periods even when the clock stands still', () => {
    const { store } = createFixture();
    const inserted = store.insert(schoolA);

    store.replace({ id: inserted.id, name: 'B', address: 'X', principalName: 'Y' });
    store.replace({ id: inserted.id, name: 'C', address: 'X', principalName: 'Y' });

    const starts = store.versionsOf(inserted.id).map((v) => v.validFrom.getTime());
    expect(starts).toEqual([T0.getTime(), T0.getTime() + 1, T0.getTime() + 2]);
  });

  it('should return copies that cannot change stored state', () => {
    const { store } = createFixture();
    const inserted = store.insert(schoolA);

    inserted.validFrom.setTime(0);

    expect(store.findCurrent(inserted.id)?.validFrom.getTime()).toBe(T0.getTime());
  });

  it('should keep history after a delete and never reuse the id', () => {
    const { clock, store } = createFixture();
    const inserted = store.insert(schoolA);

    clock.now = at(DAY);
    expect(store.remove(inserted.id)).toBe(true);

    expect(store.findCurrent(inserted.id)).toBeUndefined();
    expect(store.size).toBe(0);
    const [closed] = store.versionsOf(inserted.id);
    expect(closed?.validTo.getTime()).toBe(at(DAY).getTime());
    expect(store.insert(schoolA).id).toBe(2);
  });

  it('should produce one version per write', () => {
    fc.assert(
      fc.property(fc.array(fc.string({ minLength: 1, maxLength: 100 }), { maxLength: 20 }), (names) => {
        const { clock, store } = createFixture();
        const inserted = store.insert(schoolA);

        names.forEach((name, index) => {
          clock.now = at((index + 1) * 1000);
          store.replace({ id: inserted.id, name, address: 'X', principalName: 'Y' });
        });

        const versions = store.versionsOf(inserted.id);
        expect(versions).toHaveLength(names.length + 1);
        expect(versions.map((v) => v.version)).toEqual(versions.map((_, i) => i + 1));
        // Only the last version is current
        expect(versions.filter((v) => v.validTo.getTime() === MAX_VALID_TO.getTime())).toHaveLength(1);
        for (let i = 1; i < versions.length; i++) {
          expect(versions[i]?.validFrom.getTime()).toBe(versions[i - 1]?.validTo.getTime());
        }
      })
    );
  });
});

describe('InMemory school repositories', () => {
  describe('date range queries', () => {
    async function renamedAfterFiveDays() {
      const fixture = createFixture();
      const added = okValue(await fixture.commands.add(schoolA));
      fixture.clock.now = at(5 * DAY);
      okValue(
        await fixture.commands.update({
          id: added.id,
          name: 'B',
          address: schoolA.address,
          principalName: schoolA.principalName,
        })
      );
      return fixture;
    }

    it('should return only the version valid after the rename', async () => {
      const { queries } = await renamedAfterFiveDays();

      const result = await queries.getSchoolsByDateRange(at(6 * DAY), MAX_VALID_TO);

      expect(isOk(result)).toBe(true);
      if (isOk(result)) {
        expect(result.value.map((s) => s.name)).toEqual(['B']);
      }
    });

    it('should return only the version valid before the rename', async () => {
      const { queries } = await renamedAfterFiveDays();

      const result = await queries.getSchoolsByDateRange(at(-DAY), at(DAY));

      expect(isOk(result)).toBe(true);
      if (isOk(result)) {
        expect(result.value.map((s) => s.name)).toEqual(['A']);
      }
    });

    it('should include both versions when the range touches the switch instant', async () => {
      const { queries } = await renamedAfterFiveDays();

      const result = await queries.getSchoolsByDateRange(at(5 * DAY), at(5 * DAY));

      expect(isOk(result)).toBe(true);
      if (isOk(result)) {
        expect(result.value.map((s) => s.name)).toEqual(['A', 'B']);
      }
    });

    it('should report the range when nothing overlaps', async () => {
      const { queries } = createFixture();

      const result = await queries.getSchoolsByDateRange(at(-2 * DAY), at(-DAY));

      expect(isErr(result)).toBe(true);
      if (isErr(result)) {
        expect(result.error.code).toBe('NoSchoolsInDateRange');
        expect(result.error.params).toEqual({
          fromDate: '2024-02-28T08:00:00.000Z',
          toDate: '2024-02-29T08:00:00.000Z',
        });
      }
    });
  });

  it('should reject an update carrying a stale version', async () => {
    const { commands } = createFixture();
    const added = okValue(await commands.add(schoolA));

    const result = await commands.update({
      id: added.id,
      name: 'B',
      address: 'X',
      principalName: 'Y',
      version: 2,
    });

    expect(isErr(result)).toBe(true);
    if (isErr(result)) {
      expect(result.error.code).toBe('SchoolVersionConflict');
    }
  });

  it('should return SchoolNotFound for updates and deletes of unknown ids', async () => {
    const { commands } = createFixture();

    const update = await commands.update({ id: 99, name: 'B', address: 'X', principalName: 'Y' });
    const removal = await commands.delete({ id: 99 });

    expect(isErr(update) && update.error.code).toBe('SchoolNotFound');
    expect(isErr(removal) && removal.error.code).toBe('SchoolNotFound');
  });

  it('should keep every version queryable after a delete', async () => {
    const { clock, commands, queries } = createFixture();
    const added = okValue(await commands.add(schoolA));
    clock.now = at(DAY);
    okValue(await commands.update({ id: added.id, name: 'B', address: 'X', principalName: 'Y' }));
    clock.now = at(2 * DAY);
    okValue(await commands.delete({ id: added.id }));

    const current = await queries.getById(added.id);
    const versions = await queries.getAllVersions(added.id);

    expect(isErr(current) && current.error.code).toBe('SchoolNotFound');
    expect(isOk(versions) && versions.value.map((v) => v.name)).toEqual(['A', 'B']);
  });

  it('should return NoSchoolsFound on an empty store', async () => {
    const { queries } = createFixture();

    const result = await queries.getAll();

    expect(isErr(result) && result.error.code).toBe('NoSchoolsFound');
  });
});
