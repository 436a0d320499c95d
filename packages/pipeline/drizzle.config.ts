import { defineConfig } from "drizzle-kit";

const databaseUrl =
  process.env.DATABASE_URL ?? "postgresql://localhost:5432/digest_dev";

export default defineConfig({
  // Compiled JS schema, so Drizzle Kit can load it without a TS loader for `.js` specifiers.
  schema: "../../dist/pipeline/src/db/schema/index.js",
  out: "./drizzle",
  dialect: "postgresql",
  dbCredentials: {
    url: databaseUrl,
  },
});
