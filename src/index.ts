#!/usr/bin/env node

import { runCli } from "./cli.js";
import { initI18n } from "./i18n/index.js";
import { getLogger } from "./utils/logger.js";

async function main() {
  await initI18n();
  await getLogger().init();
  const exitCode = await runCli(process.argv.slice(2));
  await getLogger().close();
  process.exit(exitCode);
}

main().catch((err: unknown) => {
  console.error("vault-graph failed:", err);
  process.exit(2);
});
