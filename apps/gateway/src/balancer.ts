import type { ServiceType } from '@schoolreg/types';

/**
 * Round-robin over the replicas of each pool
 *
 * One counter per pool, so traffic on one pool never shifts the rotation of
 * another. The first pick of a pool is its first host.
 */
export class RoundRobinBalancer {
  private readonly counters = new Map<ServiceType, number>();

  constructor(private readonly pools: Readonly<Record<ServiceType, readonly string[]>>) {}

  next(pool: ServiceType): string {
    const hosts = this.pools[pool];
    const counter = this.counters.get(pool) ?? 0;
    const host = hosts[counter % hosts.length];
    if (host === undefined) {
      throw new Error(`Pool "${pool}" has no hosts`);
    }
    this.counters.set(pool, (counter + 1) % hosts.length);
    return host;
  }
}
