/**
 * In-Memory Temporal School Store
 *
 * Test/development stand-in for the PostgreSQL tables and their versioning
 * triggers: one current version per live id, an append-only history, and a
 * single timestamp that closes the old version and opens the new one.
 *
 * WARNING: Not suitable for production - data is lost on restart.
 *
 * @module @schoolreg/infrastructure/repositories/InMemoryTemporalSchoolStore
 */

import { MAX_VALID_TO, type NewSchool, type School, type SchoolChanges } from '@schoolreg/domain';

export interface InMemoryTemporalSchoolStoreOptions {
  /** Source of period timestamps; tests pin it to make history deterministic */
  clock?: () => Date;
}

function cloneSchool(school: School): School {
  return {
    ...school,
    createdAt: new Date(school.createdAt),
    validFrom: new Date(school.validFrom),
    validTo: new Date(school.validTo),
  };
}

export class InMemoryTemporalSchoolStore {
  private readonly current = new Map<number, School>();
  private readonly history: School[] = [];
  private readonly clock: () => Date;
  private nextId = 1;

  constructor(options: InMemoryTemporalSchoolStoreOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  insert(school: NewSchool): School {
    const stored: School = {
      id: this.nextId++,
      name: school.name,
      address: school.address,
      principalName: school.principalName,
      createdAt: new Date(school.createdAt),
      validFrom: this.clock(),
      validTo: MAX_VALID_TO,
      version: 1,
    };
    this.current.set(stored.id, stored);
    return cloneSchool(stored);
  }

  findCurrent(id: number): School | undefined {
    const found = this.current.get(id);
    return found ? cloneSchool(found) : undefined;
  }

  /**
   * Current versions ordered by id
   */
  listCurrent(): School[] {
    return [...this.current.values()].sort((a, b) => a.id - b.id).map(cloneSchool);
  }

  /**
   * Close the current version into history and open a new one.
   * Returns undefined when the id has no current version.
   */
  replace(changes: SchoolChanges): School | undefined {
    const existing = this.current.get(changes.id);
    if (!existing) return undefined;

    const switchedAt = this.nextTimestamp(existing.validFrom);
    this.history.push({ ...existing, validTo: switchedAt });

    const next: School = {
      ...existing,
      name: changes.name,
      address: changes.address,
      principalName: changes.principalName,
      validFrom: switchedAt,
      validTo: MAX_VALID_TO,
      version: existing.version + 1,
    };
    this.current.set(next.id, next);
    return cloneSchool(next);
  }

  /**
   * Close the current version into history; the id is never reused
   */
  remove(id: number): boolean {
    const existing = this.current.get(id);
    if (!existing) return false;

    this.history.push({ ...existing, validTo: this.nextTimestamp(existing.validFrom) });
    this.current.delete(id);
    return true;
  }

  /**
   * Every version, historical first then current, stably ordered by validFrom
   */
  allVersions(): School[] {
    return [...this.history, ...this.listCurrent()]
      .sort((a, b) => a.validFrom.getTime() - b.validFrom.getTime())
      .map(cloneSchool);
  }

  versionsOf(id: number): School[] {
    return this.allVersions().filter((school) => school.id === id);
  }

  get size(): number {
    return this.current.size;
  }

  // Periods of one school must strictly advance even if the clock stalls
  private nextTimestamp(after: Date): Date {
    const now = this.clock();
    return now.getTime() > after.getTime() ? now : new Date(after.getTime() + 1);
  }
}
