/**
 * Wrappers for column values whose text form matters to result comparison.
 * postgres.js hands `numeric` out as a bare string and dates as `Date`
 * objects; keeping the server text lets the comparator round decimals
 * exactly and read the calendar date without a timezone shift.
 */

/** A `numeric` value, kept as the server printed it. */
export class SqlDecimal {
  constructor(readonly text: string) {}

  toString(): string {
    return this.text;
  }

  toJSON(): string {
    return this.text;
  }
}

/** A `date`, `timestamp` or `timestamptz` value in ISO text form. */
export class SqlTemporal {
  constructor(readonly text: string) {}

  /** The calendar date part, `YYYY-MM-DD`. */
  get date(): string {
    return this.text.slice(0, 10);
  }

  toString(): string {
    return this.text;
  }

  toJSON(): string {
    return this.text;
  }
}

export const NUMERIC_OID = 1700;
export const DATE_OID = 1082;
export const TIMESTAMP_OID = 1114;
export const TIMESTAMPTZ_OID = 1184;
