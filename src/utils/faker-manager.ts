import { faker, type Faker } from '@faker-js/faker';
import { logger } from './logger';

/**
 * Shared faker access for mock payloads and generated work units.
 * Seeding makes ids and item data reproducible across runs.
 */
export class FakerManager {
  private static _instance: FakerManager | null = null;
  private _seed: number | undefined;
  private _initialized: boolean = false;

  private constructor() {}

  static getInstance(): FakerManager {
    if (!FakerManager._instance) {
      FakerManager._instance = new FakerManager();
    }
    return FakerManager._instance;
  }

  get isInitialized(): boolean {
    return this._initialized;
  }

  get seed(): number | undefined {
    return this._seed;
  }

  /**
   * Set seed for reproducible data
   */
  setSeed(seed: number | undefined): void {
    this._seed = seed;
    if (this._initialized) {
      this.applySeed();
    }
  }

  getFaker(): Faker {
    if (!this._initialized) {
      this.applySeed();
      this._initialized = true;
      logger.debug(`Faker initialized${this._seed !== undefined ? ` with seed ${this._seed}` : ''}`);
    }
    return faker;
  }

  private applySeed(): void {
    if (this._seed !== undefined) {
      faker.seed(this._seed);
    } else {
      faker.seed();
    }
  }

  /**
   * Reset the manager (useful for testing)
   */
  reset(): void {
    this._seed = undefined;
    this._initialized = false;
  }
}

export const fakerManager = FakerManager.getInstance();

export function getFaker(): Faker {
  return fakerManager.getFaker();
}
