/**
 * Tool Registry
 * Discovers benchmark subjects from a directory of executables.
 * Built once per run and passed explicitly to whoever needs it.
 */

import * as fs from 'fs';
import * as path from 'path';
import { DuplicateToolError, SetupError } from '../errors.js';
import { isExecutableFile } from '../utils/process.js';
import { ToolAdapter } from './adapter.js';

export interface DiscoverOptions {
  /** Environment handed to every tool invocation */
  env?: NodeJS.ProcessEnv;
}

/**
 * Identifier for an executable: its file name without the last extension
 */
export function toolIdFromFileName(fileName: string): string {
  return path.parse(fileName).name;
}

export class ToolRegistry {
  private readonly adapters: ReadonlyMap<string, ToolAdapter>;
  private readonly ordered: readonly ToolAdapter[];

  constructor(adapters: ToolAdapter[]) {
    const byId = new Map<string, ToolAdapter>();
    for (const adapter of adapters) {
      const existing = byId.get(adapter.id);
      if (existing) {
        throw new DuplicateToolError(adapter.id, [existing.path, adapter.path]);
      }
      byId.set(adapter.id, adapter);
    }

    this.adapters = byId;
    this.ordered = Object.freeze(
      [...byId.values()].sort((a, b) => a.id.localeCompare(b.id))
    );
    Object.freeze(this);
  }

  get size(): number {
    return this.ordered.length;
  }

  /**
   * All tools, sorted by identifier
   */
  list(): readonly ToolAdapter[] {
    return this.ordered;
  }

  ids(): string[] {
    return this.ordered.map(a => a.id);
  }

  get(id: string): ToolAdapter | undefined {
    return this.adapters.get(id);
  }

  has(id: string): boolean {
    return this.adapters.has(id);
  }
}

/**
 * Scan a directory (non-recursively) for executable files
 */
export function discoverTools(directory: string, options: DiscoverOptions = {}): ToolRegistry {
  const absoluteDir = path.resolve(directory);

  if (!fs.existsSync(absoluteDir) || !fs.statSync(absoluteDir).isDirectory()) {
    throw new SetupError(
      `Tools directory not found: ${absoluteDir}`,
      'TOOLS_DIR_MISSING',
      { directory: absoluteDir }
    );
  }

  const found = new Map<string, string[]>();
  const entries = fs.readdirSync(absoluteDir).sort();

  for (const name of entries) {
    if (name.startsWith('.')) continue;

    const fullPath = path.join(absoluteDir, name);
    // Follows symlinks; directories such as obsolete/ fail the file check
    if (!isExecutableFile(fullPath)) continue;

    const id = toolIdFromFileName(name);
    const paths = found.get(id) ?? [];
    paths.push(fullPath);
    found.set(id, paths);
  }

  for (const [id, paths] of found) {
    if (paths.length > 1) {
      throw new DuplicateToolError(id, paths);
    }
  }

  if (found.size === 0) {
    throw new SetupError(
      `No executable tools found in ${absoluteDir}`,
      'NO_TOOLS_FOUND',
      { directory: absoluteDir }
    );
  }

  const adapters = [...found.entries()].map(
    ([id, paths]) => new ToolAdapter({ id, path: paths[0] }, options.env)
  );
  return new ToolRegistry(adapters);
}
