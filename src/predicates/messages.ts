import { z } from "zod";
import { predicateSchema } from "./schema.js";

/** Parent to child: the single evaluation request a child handles. */
export const evaluateMessageSchema = z.object({
  type: z.literal("evaluate"),
  request: z.object({
    predicate: predicateSchema,
    candidate: z.array(z.string()),
    reference: z.array(z.string()),
    baseline: z.array(z.string()),
    database: z.string(),
  }),
  database: z.object({
    host: z.string(),
    port: z.number(),
    user: z.string(),
    password: z.string().optional(),
    maxConnections: z.number(),
  }),
  capabilities: z.record(z.string()),
  statementTimeoutMs: z.number(),
  maxRows: z.number(),
});

export type EvaluateMessage = z.input<typeof evaluateMessageSchema>;

/** Child to parent: log lines while running, then one verdict. */
export const childMessageSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("log"),
    level: z.enum(["info", "warn", "error"]),
    message: z.string(),
  }),
  z.object({
    type: z.literal("verdict"),
    passed: z.boolean(),
    message: z.string().optional(),
  }),
]);

export type ChildMessage = z.infer<typeof childMessageSchema>;
