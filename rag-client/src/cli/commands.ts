import fs from "node:fs/promises";
import path from "node:path";
import { Command } from "commander";
import chalk from "chalk";
import type { Progress } from "@modelcontextprotocol/sdk/types.js";

import { KnowledgeBaseClient } from "../mcp/client";
import { extractTextBlocks, isErrorResult } from "./format";

const withClient = async (
  runner: (client: KnowledgeBaseClient) => Promise<void>
): Promise<void> => {
  const client = new KnowledgeBaseClient();
  try {
    await runner(client);
  } finally {
    await client.close();
  }
};

const printProgress = (progress: Progress) => {
  const segments = [
    progress.progress !== undefined ? `#${progress.progress}` : null,
    progress.message ?? null,
  ].filter(Boolean);

  if (!segments.length) {
    return;
  }

  console.log(chalk.dim(`[progress] ${segments.join(" ")}`));
};

const printResult = (result: unknown) => {
  const blocks = extractTextBlocks(result);

  if (isErrorResult(result)) {
    console.error(chalk.red(blocks.join("\n") || "Tool call failed"));
    process.exitCode = 1;
    return;
  }

  console.log(blocks.length ? blocks.join("\n\n") : "<no content>");
};

export const buildCli = () => {
  const program = new Command();

  program
    .name("rag-client")
    .description("Query and feed the document knowledge base over MCP");

  program
    .command("list-tools")
    .description("List tools exposed by the knowledge base server")
    .action(async () => {
      await withClient(async (client) => {
        const response = await client.listTools();
        if (!response.tools.length) {
          console.log("No tools reported by the server.");
          return;
        }

        for (const tool of response.tools) {
          const description = tool.description ? ` - ${tool.description}` : "";
          console.log(`${chalk.green(tool.name)}${description}`);
        }
      });
    });

  program
    .command("sources")
    .description("List the documents currently indexed")
    .action(async () => {
      await withClient(async (client) => {
        printResult(await client.listSources());
      });
    });

  program
    .command("ingest")
    .description("Upload a document (.txt, .md, .pdf or an image)")
    .argument("<file>", "Path of the document to add")
    .action(async (file: string) => {
      const content = await fs.readFile(file);
      await withClient(async (client) => {
        printResult(await client.ingest(path.basename(file), content));
      });
    });

  program
    .command("reset")
    .description("Delete every indexed document")
    .action(async () => {
      await withClient(async (client) => {
        printResult(await client.reset());
      });
    });

  program
    .command("ask")
    .description("Ask a question and show the verified sources")
    .requiredOption("-q, --question <text>", "Question to ask")
    .option("-i, --image <file>", "Image to send along with the question")
    .option("--json", "Print the raw JSON response")
    .action(
      async (opts: { question: string; image?: string; json?: boolean }) => {
        const image = opts.image ? await fs.readFile(opts.image) : undefined;

        await withClient(async (client) => {
          const result = await client.ask(opts.question, image, {
            onprogress: printProgress,
            resetTimeoutOnProgress: true,
          });

          if (opts.json) {
            console.log(JSON.stringify(result, null, 2));
            return;
          }

          printResult(result);
        });
      }
    );

  return program;
};
