import { logger } from "../logger";
import { buildProgram } from "./program";

async function main() {
  await buildProgram().parseAsync(process.argv);
}

main().catch((error) => {
  logger.error("docs-health failed:", error);
  process.exit(1);
});
