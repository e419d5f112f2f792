import * as os from 'os';
import * as v8 from 'v8';
import { supportsCheapTasks } from './substrate';
import { processorCount } from '../config/defaults';

export interface EnvironmentInfo {
  node_version: string;
  v8_version: string;
  platform: string;
  arch: string;
  node_options: string;
  processors: number;
  cheap_task_supported: boolean;
  memory: {
    total_mb: number;
    free_mb: number;
    heap_limit_mb: number;
    heap_used_mb: number;
    rss_mb: number;
  };
}

const toMb = (bytes: number): number => Math.round(bytes / 1024 / 1024);

export function inspectEnvironment(): EnvironmentInfo {
  const heap = v8.getHeapStatistics();
  const usage = process.memoryUsage();

  return {
    node_version: process.version,
    v8_version: process.versions.v8,
    platform: process.platform,
    arch: process.arch,
    node_options: process.env.NODE_OPTIONS ?? '',
    processors: processorCount(),
    cheap_task_supported: supportsCheapTasks(),
    memory: {
      total_mb: toMb(os.totalmem()),
      free_mb: toMb(os.freemem()),
      heap_limit_mb: toMb(heap.heap_size_limit),
      heap_used_mb: toMb(usage.heapUsed),
      rss_mb: toMb(usage.rss)
    }
  };
}

/**
 * Environment block written into result files
 */
export function describeRuntime(info: EnvironmentInfo = inspectEnvironment()): Record<string, string | number> {
  return {
    node_version: info.node_version,
    v8_version: info.v8_version,
    platform: `${info.platform}-${info.arch}`,
    processors: info.processors,
    max_memory: info.memory.heap_limit_mb
  };
}
