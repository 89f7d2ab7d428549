import { pgSchema, text, uuid } from "drizzle-orm/pg-core";

export const coreSchema = pgSchema("core");

export const companiesTable = coreSchema.table("companies", {
  id: uuid("id").primaryKey().defaultRandom(),
  ticker: text("ticker").notNull().unique(),
  companyName: text("company_name").notNull(),
  exchange: text("exchange"),
  sector: text("sector"),
  industry: text("industry"),
  country: text("country"),
  website: text("website"),
  description: text("description"),
});

export const securitiesTable = coreSchema.table("securities", {
  id: uuid("id").primaryKey().defaultRandom(),
  companyId: uuid("company_id")
    .notNull()
    .references(() => companiesTable.id),
  symbol: text("symbol").notNull().unique(),
  securityType: text("security_type").notNull(),
  currency: text("currency"),
});
