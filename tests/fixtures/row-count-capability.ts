import type { PredicateCapability } from "../../src/predicates/capability.js";

/** Passes when `options.table` holds exactly `options.expected` rows. */
const rowCount: PredicateCapability = {
  async evaluate({ connect, options, logger }) {
    const table = String(options.table);
    const connection = await connect();
    const { rows } = await connection.run(`SELECT COUNT(*) FROM ${table}`);
    const count = Number(rows[0]?.[0]);
    logger.info(`${table} has ${String(count)} rows`);
    return count === options.expected;
  },
};

export default rowCount;
