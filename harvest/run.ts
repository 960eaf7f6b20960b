import "dotenv/config";
import { ingestIndia } from "./adapters/india.ingest.js";
import { loadConfig } from "./config.js";
import { IntegrityViolation } from "./finalize.js";

const adapters: Record<string, () => Promise<unknown>> = {
  india: () => ingestIndia(loadConfig()),
};

const target = process.argv[2] ?? "india";
if (!adapters[target]) {
  console.error(`Usage: npm run ingest -- <${Object.keys(adapters).join("|")}>`);
  process.exit(1);
}
adapters[target]().then(() => {
  console.log(`${target} done`);
}).catch(err => {
  if (err instanceof IntegrityViolation) {
    console.error(`Integrity check failed (${err.invariant}); no workbook written.\n${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
