import { computeExponentialBackoff } from '@esforge/shared';
import { ImproperlyConfigured } from './errors';
import { RoundRobinSelector, type NodeSelector } from './selector';
import type { Connection } from './types';

export interface ConnectionPool {
  readonly connections: readonly Connection[];
  getConnection(): Connection;
  markDead(connection: Connection, now?: number): void;
  markLive(connection: Connection): void;
  resurrect(force?: boolean): Connection | null;
  close(): Promise<void>;
}

export type NodePoolOptions = {
  selector?: NodeSelector;
  randomizeNodes?: boolean;
  deadTimeoutMs?: number;
  timeoutCutoff?: number;
  now?: () => number;
  random?: () => number;
};

type DeadEntry = {
  resurrectAt: number;
  connection: Connection;
};

function shuffle<T>(items: T[], random: () => number): T[] {
  for (let i = items.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items;
}

/**
 * Tracks live and dead connections. A failed connection is parked with an exponentially
 * growing timeout and put back into rotation once that timeout has passed.
 */
export class NodePool implements ConnectionPool {
  private live: Connection[];
  private dead: DeadEntry[] = [];
  private readonly failures = new Map<Connection, number>();
  private readonly all: readonly Connection[];
  private readonly selector: NodeSelector;
  private readonly deadTimeoutMs: number;
  private readonly timeoutCutoff: number;
  private readonly now: () => number;

  constructor(connections: readonly Connection[], options: NodePoolOptions = {}) {
    if (connections.length === 0) {
      throw new ImproperlyConfigured('No defined connections, you need to specify at least one host.');
    }
    const random = options.random ?? Math.random;
    this.all = [...connections];
    this.live = options.randomizeNodes === false ? [...connections] : shuffle([...connections], random);
    this.selector = options.selector ?? new RoundRobinSelector();
    this.deadTimeoutMs = options.deadTimeoutMs ?? 60_000;
    this.timeoutCutoff = options.timeoutCutoff ?? 5;
    this.now = options.now ?? Date.now;
  }

  get connections(): readonly Connection[] {
    return this.live;
  }

  get deadCount(): number {
    return this.dead.length;
  }

  failureCount(connection: Connection): number {
    return this.failures.get(connection) ?? 0;
  }

  markDead(connection: Connection, now: number = this.now()): void {
    const index = this.live.indexOf(connection);
    if (index === -1) {
      return;
    }
    this.live.splice(index, 1);
    const failures = (this.failures.get(connection) ?? 0) + 1;
    this.failures.set(connection, failures);
    const timeout = computeExponentialBackoff(failures, {
      baseMs: this.deadTimeoutMs,
      factor: 2,
      maxMs: this.deadTimeoutMs * 2 ** this.timeoutCutoff
    });
    const entry: DeadEntry = { resurrectAt: now + timeout, connection };
    const position = this.dead.findIndex((candidate) => candidate.resurrectAt > entry.resurrectAt);
    if (position === -1) {
      this.dead.push(entry);
    } else {
      this.dead.splice(position, 0, entry);
    }
  }

  markLive(connection: Connection): void {
    this.failures.delete(connection);
  }

  resurrect(force = false): Connection | null {
    const next = this.dead[0];
    if (!next) {
      return null;
    }
    if (!force && next.resurrectAt > this.now()) {
      return null;
    }
    this.dead.shift();
    this.live.push(next.connection);
    return next.connection;
  }

  getConnection(): Connection {
    const resurrected = this.resurrect();
    if (resurrected) {
      return resurrected;
    }
    if (this.live.length === 0) {
      const forced = this.resurrect(true);
      if (!forced) {
        throw new ImproperlyConfigured('No connections available in the pool');
      }
      return forced;
    }
    return this.selector.select(this.live);
  }

  async close(): Promise<void> {
    await Promise.all(this.all.map((connection) => connection.close()));
  }
}

export class SingleNodePool implements ConnectionPool {
  readonly connections: readonly Connection[];

  constructor(private readonly connection: Connection) {
    this.connections = [connection];
  }

  getConnection(): Connection {
    return this.connection;
  }

  markDead(): void {}

  markLive(): void {}

  resurrect(): Connection | null {
    return null;
  }

  async close(): Promise<void> {
    await this.connection.close();
  }
}

export class EmptyNodePool implements ConnectionPool {
  readonly connections: readonly Connection[] = [];

  getConnection(): Connection {
    throw new ImproperlyConfigured('No connections were configured');
  }

  markDead(): void {
    throw new ImproperlyConfigured('No connections were configured');
  }

  markLive(): void {
    throw new ImproperlyConfigured('No connections were configured');
  }

  resurrect(): Connection | null {
    throw new ImproperlyConfigured('No connections were configured');
  }

  async close(): Promise<void> {}
}
