/**
 * Hardware and software snapshot, captured once per run
 */

import * as fs from 'fs';
import * as os from 'os';
import { commandVersion, runCommand } from '../utils/process.js';
import { TimingEngine } from '../trials/timing-engine.js';
import { CacheEvictor } from '../cache/evictor.js';

const NA = 'N/A';

export interface EnvironmentSnapshot {
  hostname: string;
  os: string;
  kernel: string;
  architecture: string;
  cpu: string;
  cpuCores: number;
  ramTotalBytes: number;
  diskTotalBytes: number | null;
  diskAvailableBytes: number | null;
  nodeVersion: string;
  timingEngine: string;
  timingEngineVersion: string;
  pythonVersion: string;
  javaVersion: string;
  cacheEvictor: string;
  cacheEvictionAvailable: boolean;
  passwordlessSudo: boolean;
  timestamp: string;
}

export interface EnvironmentProbeOptions {
  projectRoot: string;
  engine: TimingEngine;
  evictor: CacheEvictor;
}

function diskUsage(target: string): { total: number; available: number } | null {
  try {
    const stats = fs.statfsSync(target);
    return {
      total: stats.blocks * stats.bsize,
      available: stats.bavail * stats.bsize,
    };
  } catch {
    return null;
  }
}

async function sudoAvailable(): Promise<boolean> {
  try {
    const result = await runCommand('sudo', ['-n', 'true'], { timeoutMs: 5_000 });
    return result.exitCode === 0;
  } catch {
    return false;
  }
}

/**
 * Extract the quoted version from `java -version`, e.g. openjdk version "21.0.2"
 */
export function parseJavaVersion(line: string | null): string {
  if (!line) return NA;
  const match = line.match(/"([^"]+)"/);
  return match ? match[1] : line;
}

export async function captureEnvironment(options: EnvironmentProbeOptions): Promise<EnvironmentSnapshot> {
  const cpus = os.cpus();
  const disk = diskUsage(options.projectRoot);

  const [engineVersion, python, java, evictionAvailable, sudo] = await Promise.all([
    options.engine.version(),
    commandVersion('python3', ['--version']),
    commandVersion('java', ['-version']),
    options.evictor.isAvailable(),
    sudoAvailable(),
  ]);

  return {
    hostname: os.hostname(),
    os: os.type(),
    kernel: os.release(),
    architecture: os.arch(),
    cpu: cpus[0]?.model.trim() || NA,
    cpuCores: cpus.length,
    ramTotalBytes: os.totalmem(),
    diskTotalBytes: disk?.total ?? null,
    diskAvailableBytes: disk?.available ?? null,
    nodeVersion: process.version,
    timingEngine: options.engine.name,
    timingEngineVersion: engineVersion ?? NA,
    pythonVersion: python ? python.replace(/^Python\s+/, '') : NA,
    javaVersion: parseJavaVersion(java),
    cacheEvictor: options.evictor.name,
    cacheEvictionAvailable: evictionAvailable,
    passwordlessSudo: sudo,
    timestamp: new Date().toISOString(),
  };
}
