import type { Connection } from './types';

export interface NodeSelector {
  select(connections: readonly Connection[]): Connection;
}

export class RoundRobinSelector implements NodeSelector {
  private position = -1;

  select(connections: readonly Connection[]): Connection {
    if (connections.length === 0) {
      throw new RangeError('Cannot select from an empty connection list');
    }
    this.position = (this.position + 1) % connections.length;
    return connections[this.position];
  }
}

export class RandomSelector implements NodeSelector {
  constructor(private readonly random: () => number = Math.random) {}

  select(connections: readonly Connection[]): Connection {
    if (connections.length === 0) {
      throw new RangeError('Cannot select from an empty connection list');
    }
    const index = Math.min(connections.length - 1, Math.floor(this.random() * connections.length));
    return connections[index];
  }
}
