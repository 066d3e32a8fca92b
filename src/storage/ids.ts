import { randomUUID } from 'crypto';
import type { IdStrategy } from '../config';

export interface IdGenerator {
  next(prefix: string): string;
}

/**
 * `<prefix>_1`, `<prefix>_2`, ... per prefix. Counters never move backwards,
 * so removing a record cannot cause an ID to be handed out twice.
 */
export class CounterIdGenerator implements IdGenerator {
  private counters = new Map<string, number>();

  next(prefix: string): string {
    const n = (this.counters.get(prefix) ?? 0) + 1;
    this.counters.set(prefix, n);
    return `${prefix}_${n}`;
  }
}

export class RandomIdGenerator implements IdGenerator {
  next(prefix: string): string {
    return `${prefix}_${randomUUID()}`;
  }
}

export function createIdGenerator(strategy: IdStrategy): IdGenerator {
  switch (strategy) {
    case 'random':
      return new RandomIdGenerator();
    case 'counter':
      return new CounterIdGenerator();
    default:
      throw new Error(`Unsupported id strategy: ${String(strategy)}`);
  }
}
