import os from "node:os";

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(Math.round(ms))}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(2)}s`;
  if (ms < 3600_000) {
    const minutes = Math.floor(ms / 60_000);
    const seconds = Math.floor((ms % 60_000) / 1000);
    return `${String(minutes)}m ${String(seconds)}s`;
  }
  const hours = Math.floor(ms / 3600_000);
  const minutes = Math.floor((ms % 3600_000) / 60_000);
  const seconds = Math.floor((ms % 60_000) / 1000);
  return `${String(hours)}h ${String(minutes)}m ${String(seconds)}s`;
}

export interface DurationStats {
  min: number;
  max: number;
  avg: number;
  median: number;
  p95: number;
}

/**
 * Calculate statistics from an array of numbers
 */
export function calculateStats(values: number[]): DurationStats {
  if (values.length === 0) {
    return { min: 0, max: 0, avg: 0, median: 0, p95: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const sum = sorted.reduce((a, b) => a + b, 0);

  return {
    min: sorted[0] ?? 0,
    max: sorted[sorted.length - 1] ?? 0,
    avg: sum / sorted.length,
    median: sorted[Math.floor(sorted.length / 2)] ?? 0,
    p95: sorted[Math.floor(sorted.length * 0.95)] ?? 0,
  };
}

export type InstanceId = string | number;

/**
 * Total order over instance ids: numbers numerically and before strings,
 * strings by code unit.
 */
export function compareInstanceIds(a: InstanceId, b: InstanceId): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "number") return -1;
  if (typeof b === "number") return 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Environment information for reports
 */
export interface EnvironmentInfo {
  /** Total system memory in GB */
  totalMemoryGB: number;
  /** Available system memory in GB */
  freeMemoryGB: number;
  /** Number of CPU cores */
  cpuCores: number;
  /** CPU model */
  cpuModel: string;
  /** Operating system platform */
  platform: string;
  /** Operating system release */
  osRelease: string;
  /** Node.js version */
  nodeVersion: string;
}

/**
 * Detect environment information
 */
export function getEnvironmentInfo(): EnvironmentInfo {
  const cpus = os.cpus();
  return {
    totalMemoryGB: Math.round(os.totalmem() / (1024 * 1024 * 1024)),
    freeMemoryGB: Math.round(os.freemem() / (1024 * 1024 * 1024)),
    cpuCores: cpus.length,
    cpuModel: cpus[0]?.model ?? "Unknown",
    platform: os.platform(),
    osRelease: os.release(),
    nodeVersion: process.version,
  };
}
