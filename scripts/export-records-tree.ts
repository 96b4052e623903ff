#!/usr/bin/env npx tsx
/**
 * Records Tree Export Script
 *
 * Builds the records tree for the configured study and writes it, with the
 * error report, to a JSON file.
 *
 * Usage:
 *   npx tsx scripts/export-records-tree.ts
 *   npx tsx scripts/export-records-tree.ts --mode eav --out out/tree.json
 *   npx tsx scripts/export-records-tree.ts --raw-selectors   # keep raw choice codes
 *
 * Requirements:
 *   - STUDY_API_URL and STUDY_API_TOKEN set (see .env.example)
 */

import * as fs from "fs";
import * as path from "path";
import * as dotenv from "dotenv";

// Load environment variables from .env.local
dotenv.config({ path: ".env.local" });

import { loadConfig } from "../src/lib/config";
import { HttpStudyConnector } from "../src/lib/connector";
import { describeError } from "../src/lib/errors";
import { buildRecordsTree, serializeRecordsTree } from "../src/lib/records-tree";
import { RecordsModeSchema } from "../src/types/study";

const DEFAULT_OUT = path.join("out", "records-tree.json");

function argValue(args: string[], name: string): string | undefined {
  const i = args.indexOf(name);
  return i >= 0 ? args[i + 1] : undefined;
}

async function main() {
  const args = process.argv.slice(2);
  const mode = RecordsModeSchema.parse(argValue(args, "--mode") ?? "flat");
  const rawSelectors = args.includes("--raw-selectors");
  const outPath = argValue(args, "--out") ?? DEFAULT_OUT;

  const config = loadConfig();
  const connector = HttpStudyConnector.fromConfig(config);

  console.log(`Building records tree (${mode}${rawSelectors ? ", raw selectors" : ""})...`);
  const { tree, errors } = await buildRecordsTree(connector, { mode, rawSelectors });

  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(
    outPath,
    JSON.stringify({ tree: serializeRecordsTree(tree), errors: errors.toJSON() }, null, 2)
  );
  console.log(`Wrote ${outPath}`);

  console.log("\n=== Rejected values ===");
  if (errors.isEmpty) {
    console.log("  none");
  }
  for (const category of errors.categories) {
    console.log(`  ${category}: ${errors.count(category)}`);
  }
}

main().catch((e) => {
  console.error(describeError(e));
  process.exit(1);
});
