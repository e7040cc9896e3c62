import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import type { Db } from "./client";

const schemaPath = fileURLToPath(new URL("./schema.sql", import.meta.url));

let schemaSql: string | null = null;

/** Forward-only: every statement in schema.sql is `IF NOT EXISTS`. */
export function migrate(db: Db): void {
  schemaSql ??= readFileSync(schemaPath, "utf8");
  db.exec(schemaSql);
}
