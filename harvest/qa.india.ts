import "dotenv/config";
import { existsSync } from "fs";
import { loadConfig } from "./config.js";
import { computeCoverage } from "./utils/coverage.js";
import { readWorkbook } from "./utils/emitter.js";

const file = process.argv[2] ?? loadConfig().outputFile;
if (!existsSync(file)) {
  console.error(`No workbook at ${file}; run the ingest first.`);
  process.exit(1);
}

console.log(JSON.stringify(computeCoverage(readWorkbook(file)), null, 2));
