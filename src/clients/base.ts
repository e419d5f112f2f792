import { SubFetchResult } from '../core/types';

/**
 * An upstream data source. Implementations may be slow or fail; callers own
 * timing and error accounting.
 */
export interface ApiClient {
  readonly name: string;
  fetch(): Promise<SubFetchResult>;
  close?(): void | Promise<void>;
}

export type RandomSource = () => number;
