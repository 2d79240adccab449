import chalk from "chalk";

import { buildCli } from "./cli/commands";

buildCli()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    const detail = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`rag-client: ${detail}`));
    process.exitCode = 1;
  });
