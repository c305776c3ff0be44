/**
 * Tool Adapter
 * One adapter per discovered wrapper, built from its descriptor.
 * Every wrapper is called the same way: `<executable> <input-file>`.
 */

import { ToolDescriptor } from '../types.js';
import { runCommand } from '../utils/process.js';
import { shellQuote } from '../utils/shell.js';

export interface ToolInvocation {
  output: Buffer;
  exitCode: number;
  durationMs: number;
}

export interface InvokeOptions {
  timeoutMs?: number;
  cwd?: string;
}

export class ToolAdapter {
  readonly descriptor: ToolDescriptor;
  readonly env: NodeJS.ProcessEnv;

  constructor(descriptor: ToolDescriptor, env: NodeJS.ProcessEnv = process.env) {
    this.descriptor = Object.freeze({ ...descriptor });
    this.env = env;
    Object.freeze(this);
  }

  get id(): string {
    return this.descriptor.id;
  }

  get path(): string {
    return this.descriptor.path;
  }

  /**
   * Run the tool once against a file and capture its report
   */
  async invoke(filePath: string, options: InvokeOptions = {}): Promise<ToolInvocation> {
    const result = await runCommand(this.descriptor.path, [filePath], {
      env: this.env,
      cwd: options.cwd,
      timeoutMs: options.timeoutMs,
    });

    return {
      output: result.stdout,
      exitCode: result.exitCode,
      durationMs: result.durationMs,
    };
  }

  /**
   * Shell form of the same call, with stdout and stderr captured to a file
   */
  shellCommand(inputPath: string, outputPath: string): string {
    return `${shellQuote(this.descriptor.path)} ${shellQuote(inputPath)} > ${shellQuote(outputPath)} 2>&1`;
  }
}
