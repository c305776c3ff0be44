/**
 * Page-cache eviction for a single file
 */

import { runCommand, findExecutable } from '../utils/process.js';

export interface CacheEvictor {
  readonly name: string;
  isAvailable(): Promise<boolean>;
  /** Throws when the pages could not be evicted */
  evict(filePath: string): Promise<void>;
  /** Argument vector that evicts the file again, run before each measured run */
  evictArgv(filePath: string): string[];
}

/**
 * Eviction through vmtouch: touch the file's pages, then evict them
 */
export class VmtouchEvictor implements CacheEvictor {
  readonly name = 'vmtouch';
  private binary: string;
  private env: NodeJS.ProcessEnv;

  constructor(binary: string = 'vmtouch', env: NodeJS.ProcessEnv = process.env) {
    this.binary = binary;
    this.env = env;
  }

  async isAvailable(): Promise<boolean> {
    return findExecutable(this.binary, this.env) !== null;
  }

  async evict(filePath: string): Promise<void> {
    for (const flag of ['-t', '-e']) {
      const result = await runCommand(this.binary, [flag, filePath], {
        env: this.env,
        timeoutMs: 60_000,
      });
      if (result.exitCode !== 0) {
        const detail = result.stderr.trim();
        throw new Error(
          `${this.binary} ${flag} exited with status ${result.exitCode}${detail ? `: ${detail}` : ''}`
        );
      }
    }
  }

  evictArgv(filePath: string): string[] {
    return [this.binary, '-e', filePath];
  }
}
