import { VirtualUser, StopSignal } from '../core/virtual-user';
import { LoadProfile } from '../config/types';

export interface LoadPattern {
  readonly name: string;
  /**
   * Start every user of the profile and resolve once all of them have returned.
   */
  execute(profile: LoadProfile, vuFactory: VUFactory, stop: StopSignal): Promise<void>;
}

export interface VUFactory {
  create: (index: number) => VirtualUser;
  recordStart: (vu: VirtualUser) => void;
}
