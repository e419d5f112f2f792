import { LoadPattern, VUFactory } from './base';
import { StopSignal, VirtualUser } from '../core/virtual-user';
import { LoadProfile } from '../config/types';
import { errorMessage, logger } from '../utils/logger';
import { sleep } from '../utils/time';

/**
 * Linear ramp: user `i` of `N` starts `ramp_up * i / N` seconds in.
 */
export class RampedPattern implements LoadPattern {
  readonly name = 'ramped';

  async execute(profile: LoadProfile, vuFactory: VUFactory, stop: StopSignal): Promise<void> {
    const rampUpMs = profile.ramp_up * 1000;
    logger.info(`🎯 Ramped load: ${profile.users} VUs, ramp-up: ${profile.ramp_up.toFixed(1)}s, duration: ${profile.duration.toFixed(1)}s`);

    const vuPromises: Promise<void>[] = [];
    for (let i = 0; i < profile.users; i++) {
      const vu = vuFactory.create(i);
      vuPromises.push(this.startAfter(startOffsetMs(rampUpMs, i, profile.users), vu, vuFactory, stop));
    }

    await Promise.all(vuPromises);
    logger.debug(`✅ Ramped pattern completed`);
  }

  private async startAfter(delayMs: number, vu: VirtualUser, vuFactory: VUFactory, stop: StopSignal): Promise<void> {
    await sleep(delayMs);
    vuFactory.recordStart(vu);
    logger.debug(`👤 Started VU ${vu.id}`);

    try {
      await vu.run(stop);
    } catch (error) {
      logger.error(`❌ VU ${vu.id} error: ${errorMessage(error)}`);
    } finally {
      logger.debug(`🏁 VU ${vu.id} completed after ${vu.iterations} iterations`);
    }
  }
}

export function startOffsetMs(rampUpMs: number, index: number, users: number): number {
  return users > 0 ? rampUpMs * (index / users) : 0;
}
