import { ApiClient, RandomSource } from './base';
import { SubFetchResult } from '../core/types';
import { getFaker } from '../utils/faker-manager';
import { TimestampHelper } from '../utils/timestamp-helper';
import { roundTo, sleep } from '../utils/time';

export interface MockApiClientOptions {
  latencyMs: number;
  errorRate: number;
  /** Uniform source in [0, 1); drives failures and item prices */
  random?: RandomSource;
}

export interface MockItem {
  id: string;
  name: string;
  price: number;
  category: string;
}

export interface MockPayload {
  items: MockItem[];
  metadata: {
    total: number;
    page: number;
    timestamp: number;
  };
}

const CATEGORIES = ['Electronics', 'Fashion', 'Home'] as const;
const ITEMS_PER_PAGE = 3;

export class SimulatedApiError extends Error {
  constructor(readonly clientName: string) {
    super(`${clientName} API Error`);
    this.name = 'SimulatedApiError';
  }
}

/**
 * Stand-in upstream: waits a fixed latency, then fails with probability
 * `errorRate` or returns a page of generated items.
 */
export class MockApiClient implements ApiClient {
  private readonly latencyMs: number;
  private readonly errorRate: number;
  private readonly random: RandomSource;
  private closed: boolean = false;

  constructor(readonly name: string, options: MockApiClientOptions) {
    this.latencyMs = options.latencyMs;
    this.errorRate = options.errorRate;
    this.random = options.random ?? Math.random;
  }

  async fetch(): Promise<SubFetchResult> {
    if (this.closed) {
      throw new Error(`${this.name} client is closed`);
    }

    await sleep(this.latencyMs);
    if (this.random() < this.errorRate) {
      throw new SimulatedApiError(this.name);
    }

    const faker = getFaker();
    return {
      source_name: this.name,
      id: faker.string.uuid(),
      timestamp: TimestampHelper.getTimestamp('offset'),
      payload: this.generatePayload()
    };
  }

  close(): void {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private generatePayload(): MockPayload {
    const items: MockItem[] = [];
    for (let i = 0; i < ITEMS_PER_PAGE; i++) {
      items.push(this.generateItem());
    }

    return {
      items,
      metadata: {
        total: ITEMS_PER_PAGE,
        page: 1,
        timestamp: Math.floor(Date.now() / 1000)
      }
    };
  }

  private generateItem(): MockItem {
    const faker = getFaker();
    return {
      id: faker.string.uuid(),
      name: `Item ${faker.number.int({ min: 0, max: 999 })}`,
      price: roundTo(this.random() * 100),
      category: faker.helpers.arrayElement(CATEGORIES)
    };
  }
}
