import {
  pgTable,
  bigserial,
  bigint,
  varchar,
  timestamp,
  index,
  pgEnum,
} from "drizzle-orm/pg-core";
import { relations } from "drizzle-orm";

// Enums
export const invoiceStatusEnum = pgEnum("invoice_status", [
  "NOT_SIGNED",
  "NOT_SENT_WS1",
  "NOT_SENT_WS2",
  "NOT_ZIPPED",
  "COMPLETED",
  "ERROR",
]);

/** Statuses that still need a trip through the external processing API */
export const PENDING_INVOICE_STATUSES = [
  "NOT_SIGNED",
  "NOT_SENT_WS1",
  "NOT_SENT_WS2",
  "NOT_ZIPPED",
] as const;

export type InvoiceStatus = (typeof invoiceStatusEnum.enumValues)[number];
export type PendingInvoiceStatus = (typeof PENDING_INVOICE_STATUSES)[number];

// Notaries table (owns the region used for grouping)
export const notaries = pgTable(
  "notaries",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    name: varchar("name", { length: 255 }).notNull(),
    region: varchar("region", { length: 100 }).notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => ({
    regionIdx: index("notaries_region_idx").on(table.region),
  })
);

// Electronic invoices table
export const invoices = pgTable(
  "invoices",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    notaryId: bigint("notary_id", { mode: "number" })
      .notNull()
      .references(() => notaries.id),
    status: invoiceStatusEnum("status").default("NOT_SIGNED").notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => ({
    statusCreatedIdx: index("invoices_status_created_idx").on(table.status, table.createdAt),
    notaryIdIdx: index("invoices_notary_id_idx").on(table.notaryId),
  })
);

// Relations
export const notariesRelations = relations(notaries, ({ many }) => ({
  invoices: many(invoices),
}));

export const invoicesRelations = relations(invoices, ({ one }) => ({
  notary: one(notaries, {
    fields: [invoices.notaryId],
    references: [notaries.id],
  }),
}));

// Type exports
export type Notary = typeof notaries.$inferSelect;
export type Invoice = typeof invoices.$inferSelect;
export type NewInvoice = typeof invoices.$inferInsert;
