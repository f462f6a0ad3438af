import { jsonb, pgTable, timestamp, varchar } from "drizzle-orm/pg-core";

// Whole-ledger snapshot, one row per deployment.
export const appRuntimeState = pgTable("app_runtime_state", {
  id: varchar("id", { length: 64 }).primaryKey(),
  stateJson: jsonb("state_json").notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull()
});
