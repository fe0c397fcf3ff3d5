import type { Connection } from "../db/connection.js";
import { describeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { NullLogger } from "../logger.js";

const DML_PREFIXES = ["SELECT", "INSERT", "UPDATE", "DELETE"];
const SAVEPOINT = "plan_cost_step";

export function isDml(statement: string): boolean {
  const upper = statement.trim().toUpperCase();
  return DML_PREFIXES.some((prefix) => upper.startsWith(prefix));
}

/**
 * Read `Plan["Total Cost"]` out of an `EXPLAIN (FORMAT JSON)` cell, which
 * postgres.js hands back parsed or, for `text` output, as a string.
 */
export function extractTotalCost(cell: unknown): number | null {
  const parsed: unknown = typeof cell === "string" ? JSON.parse(cell) : cell;
  if (!Array.isArray(parsed) || parsed.length === 0) return null;
  const first: unknown = parsed[0];
  if (typeof first !== "object" || first === null || !("Plan" in first)) return null;
  const plan: unknown = first.Plan;
  if (typeof plan !== "object" || plan === null || !("Total Cost" in plan)) return null;
  const cost = Number(plan["Total Cost"]);
  return Number.isFinite(cost) ? cost : null;
}

/**
 * Sum the planner's estimated total cost over the DML statements. Other
 * statements run for their side effects only. Each step sits under a
 * savepoint so one failing statement leaves the transaction usable.
 * Must run inside a transaction.
 */
export async function measurePlanCost(
  statements: readonly string[],
  connection: Connection,
  logger: Logger = new NullLogger()
): Promise<number> {
  let total = 0;
  for (const statement of statements) {
    const dml = isDml(statement);
    await connection.run(`SAVEPOINT ${SAVEPOINT}`);
    try {
      if (!dml) {
        logger.info(`[plan-cost] Skip EXPLAIN for non-DML: ${statement}`);
        await connection.run(statement);
      } else {
        const { rows } = await connection.run(`EXPLAIN (FORMAT JSON) ${statement}`);
        const cost = extractTotalCost(rows[0]?.[0]);
        if (cost === null) {
          logger.warn(`[plan-cost] Unexpected EXPLAIN output for ${statement}, cost skipped`);
        } else {
          total += cost;
        }
      }
      await connection.run(`RELEASE SAVEPOINT ${SAVEPOINT}`);
    } catch (error) {
      logger.error(`[plan-cost] Error on SQL '${statement}': ${describeError(error)}`);
      await connection.run(`ROLLBACK TO SAVEPOINT ${SAVEPOINT}`);
    }
  }
  return total;
}

async function measureInRolledBackTransaction(
  statements: readonly string[],
  connection: Connection,
  logger: Logger
): Promise<number> {
  await connection.begin();
  try {
    return await measurePlanCost(statements, connection, logger);
  } finally {
    await connection.rollback();
  }
}

/**
 * True iff `newStatements` are estimated strictly cheaper than
 * `oldStatements`. Both sides start from the same state: each runs in its
 * own transaction that is always rolled back.
 */
export async function compareCost(
  oldStatements: readonly string[],
  newStatements: readonly string[],
  connection: Connection,
  logger: Logger = new NullLogger()
): Promise<boolean> {
  if (oldStatements.length === 0 || newStatements.length === 0) {
    logger.warn("[plan-cost] Either side has no statements; not cheaper.");
    return false;
  }
  const oldCost = await measureInRolledBackTransaction(oldStatements, connection, logger);
  logger.info(`[plan-cost] Old statements total plan cost: ${String(oldCost)}`);
  const newCost = await measureInRolledBackTransaction(newStatements, connection, logger);
  logger.info(`[plan-cost] New statements total plan cost: ${String(newCost)}`);
  return newCost < oldCost;
}
