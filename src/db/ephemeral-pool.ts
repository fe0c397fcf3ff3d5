import { ACQUIRE_TIMEOUT_MS } from "../config.js";
import { ResourceExhaustionError, describeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { NullLogger } from "../logger.js";
import type { DatabaseAdmin } from "./admin.js";
import { templateName } from "./admin.js";
import { AsyncQueue } from "./async-queue.js";
import type { ConnectionProvider } from "./connection.js";

export interface EphemeralDatabase {
  /** Name of the clone, e.g. `shop_process_2`. */
  readonly name: string;
  /** Base database the clone was cut from. */
  readonly baseName: string;
}

export function cloneName(baseName: string, index: number): string {
  return `${baseName}_process_${String(index)}`;
}

/**
 * Disposable clones of base databases, one blocking queue per base.
 *
 * A handle is either queued or held by exactly one worker. Handles go back
 * through {@link recycle}, which rebuilds the clone from its template first,
 * so no instance sees what the previous holder left behind.
 */
export class EphemeralDatabasePool {
  private readonly queues = new Map<string, AsyncQueue<EphemeralDatabase>>();
  private readonly clones = new Map<string, EphemeralDatabase[]>();

  constructor(
    private readonly admin: DatabaseAdmin,
    private readonly connections: ConnectionProvider,
    private readonly logger: Logger = new NullLogger()
  ) {}

  /**
   * Create `copiesPerBase` clones of every base database from
   * `<base>_template`, replacing any clone left over from an earlier run.
   */
  async provision(baseNames: Iterable<string>, copiesPerBase: number): Promise<void> {
    for (const baseName of baseNames) {
      if (this.clones.has(baseName)) continue;
      const template = templateName(baseName);
      const handles: EphemeralDatabase[] = [];
      // Registered before creation so teardown also covers a partial provision.
      this.clones.set(baseName, handles);

      for (let i = 1; i <= copiesPerBase; i++) {
        const handle: EphemeralDatabase = { name: cloneName(baseName, i), baseName };
        await this.admin.dropDatabase(handle.name, true);
        this.logger.info(`Creating ephemeral db ${handle.name} from ${template}...`);
        await this.admin.createDatabase(handle.name, template);
        handles.push(handle);
      }

      this.queues.set(baseName, new AsyncQueue(handles));
      this.logger.info(
        `For base_db=${baseName}, ephemeral db list = [${handles.map((h) => h.name).join(", ")}]`
      );
    }
  }

  /** Base databases with provisioned clones. */
  get baseNames(): string[] {
    return [...this.queues.keys()];
  }

  /** Number of free clones for `baseName`. */
  available(baseName: string): number {
    return this.queues.get(baseName)?.size ?? 0;
  }

  /**
   * Wait up to `timeoutMs` for a free clone of `baseName`.
   *
   * @throws ResourceExhaustionError when none frees up in time or the base
   * database was never provisioned.
   */
  async acquire(baseName: string, timeoutMs: number = ACQUIRE_TIMEOUT_MS): Promise<EphemeralDatabase> {
    const queue = this.queues.get(baseName);
    if (!queue) throw new ResourceExhaustionError(baseName, 0);
    const handle = await queue.take(timeoutMs);
    if (!handle) throw new ResourceExhaustionError(baseName, timeoutMs);
    return handle;
  }

  /**
   * Rebuild a clone from its template: close its pool, kick remaining
   * backends, drop and recreate. Errors propagate.
   */
  async reset(handle: EphemeralDatabase): Promise<void> {
    const template = templateName(handle.baseName);
    this.logger.info(`Resetting database ${handle.name} using template ${template}`);
    await this.connections.closePool(handle.name);
    await this.admin.terminateConnections(handle.name);
    this.logger.info(`All connections to database ${handle.name} have been terminated.`);
    await this.admin.dropDatabase(handle.name, true);
    await this.admin.createDatabase(handle.name, template);
    this.logger.info(`Database ${handle.name} created from template ${template} successfully.`);
  }

  /** Return a handle to its queue. The handle is assumed clean. */
  release(handle: EphemeralDatabase): void {
    const queue = this.queues.get(handle.baseName);
    if (!queue) {
      throw new Error(`Unknown base database ${handle.baseName} for ${handle.name}`);
    }
    queue.put(handle);
  }

  /**
   * Reset then release. When the reset fails the handle stays out of the
   * pool and the error propagates.
   */
  async recycle(handle: EphemeralDatabase): Promise<void> {
    await this.reset(handle);
    this.release(handle);
  }

  /** Drop every clone. Failures are logged per clone and do not stop the sweep. */
  async teardown(): Promise<void> {
    this.logger.info("=== Cleaning up ephemeral databases ===");
    for (const handles of this.clones.values()) {
      for (const handle of handles) {
        this.logger.info(`Dropping ephemeral db: ${handle.name}`);
        try {
          await this.connections.closePool(handle.name);
          await this.admin.dropDatabase(handle.name, true);
        } catch (error) {
          this.logger.error(`Failed to drop ephemeral db ${handle.name}: ${describeError(error)}`);
        }
      }
    }
    for (const queue of this.queues.values()) queue.drain();
    this.clones.clear();
    this.queues.clear();
  }
}
