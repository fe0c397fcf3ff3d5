import { isAbsolute, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import type { Connection } from "../db/connection.js";
import type { Logger } from "../logger.js";

export interface CapabilityInput {
  candidate: readonly string[];
  reference: readonly string[];
  database: string;
  /** Connection to the instance's clone, opened on first call. */
  connect(): Promise<Connection>;
  options: Record<string, unknown>;
  logger: Logger;
}

/**
 * Extension point for verification that the built-in primitives cannot
 * express. A capability module default-exports (or exports as `capability`)
 * an object implementing this interface. Returning false or throwing fails
 * the predicate.
 */
export interface PredicateCapability {
  evaluate(input: CapabilityInput): boolean | Promise<boolean>;
}

interface LoadedCapability {
  evaluate(input: CapabilityInput): unknown;
}

/**
 * Capability name to module URL. Plain paths resolve against the working
 * directory.
 */
export class CapabilityRegistry {
  private readonly modules: Map<string, string>;
  private readonly loaded = new Map<string, Promise<LoadedCapability>>();

  constructor(entries: Record<string, string> = {}) {
    this.modules = new Map(
      Object.entries(entries).map(([name, specifier]) => [name, toModuleUrl(specifier)])
    );
  }

  /** Name to resolved module URL, safe to send to a child process. */
  toJSON(): Record<string, string> {
    return Object.fromEntries(this.modules);
  }

  load(name: string): Promise<LoadedCapability> {
    let pending = this.loaded.get(name);
    if (!pending) {
      pending = this.importCapability(name);
      this.loaded.set(name, pending);
    }
    return pending;
  }

  private async importCapability(name: string): Promise<LoadedCapability> {
    const url = this.modules.get(name);
    if (!url) throw new Error(`Unknown predicate capability '${name}'`);
    const module: unknown = await import(url);
    const candidate = pickExport(module);
    if (!candidate) {
      throw new Error(`Module for capability '${name}' exports no evaluate() implementation`);
    }
    return candidate;
  }
}

function pickExport(module: unknown): LoadedCapability | undefined {
  if (typeof module !== "object" || module === null) return undefined;
  const exported = [
    "default" in module ? module.default : undefined,
    "capability" in module ? module.capability : undefined,
  ];
  return exported.find(isCapability);
}

function isCapability(value: unknown): value is LoadedCapability {
  return (
    typeof value === "object" &&
    value !== null &&
    "evaluate" in value &&
    typeof value.evaluate === "function"
  );
}

function toModuleUrl(specifier: string): string {
  if (/^[a-z][a-z0-9+.-]*:/i.test(specifier) && !/^[a-z]:[\\/]/i.test(specifier)) {
    return specifier;
  }
  const path = isAbsolute(specifier) ? specifier : resolve(process.cwd(), specifier);
  return pathToFileURL(path).href;
}
