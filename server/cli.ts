#!/usr/bin/env node
import { writeFile } from "node:fs/promises";
import { Command } from "commander";
import {
  createTextGenerator,
  generateAiReport,
  generateJsonReport,
  generateUnifiedReport,
  runAudit,
} from "./audit";
import {
  describeError,
  loadLocalEnvFiles,
  parseCliOptions,
  type RawCliOptions,
} from "./audit/cli-options";
import { log } from "./audit/logger";

loadLocalEnvFiles();

const program = new Command();

program
  .name("llm-ready")
  .description("Audit a website for readability by AI crawlers and LLMs")
  .version("1.0.0")
  .argument("<url>", "The root URL of the site to audit")
  .option("--depth <number>", "Maximum crawl depth from the root URL", "1")
  .option("--output <path>", "Write the report to a file instead of stdout")
  .option("--format <format>", "Output format: report or json", "report")
  .option("--ai-report", "Append an AI-generated consultant report")
  .option("--openai-key <key>", "API key for text generation (defaults to OPENAI_API_KEY)")
  .option("--max-pages <number>", "Maximum number of pages to crawl", "50")
  .option("--concurrency <number>", "Number of concurrent requests", "4")
  .option("--delay <ms>", "Minimum delay between requests to the same host", "500")
  .option("--timeout <ms>", "Request timeout in milliseconds", "10000")
  .option("--user-agent <string>", "User agent string")
  .action(async (url: string, options: RawCliOptions) => {
    try {
      const settings = parseCliOptions(url, options);
      const textGenerator = createTextGenerator(settings.openaiKey);

      const result = await runAudit(settings.config, { textGenerator });

      let aiReport: string | undefined;
      if (settings.aiReport) {
        if (!textGenerator) {
          console.error(
            "Error: --ai-report needs an API key (--openai-key or OPENAI_API_KEY). Continuing without it."
          );
        } else {
          log("Generating AI report", "cli");
          const report = await generateAiReport(result, textGenerator);
          if (report.success) {
            aiReport = report.report;
          } else {
            console.error(`Error: ${report.error}. Continuing without it.`);
          }
        }
      }

      const output =
        settings.format === "json"
          ? generateJsonReport(result, aiReport)
          : generateUnifiedReport(result, { aiReport });

      if (settings.output) {
        await writeFile(settings.output, output, "utf-8");
        log(`Report written to ${settings.output}`, "cli");
      } else {
        console.log(output);
      }

      process.exit(0);
    } catch (error) {
      console.error(
        JSON.stringify(
          {
            error: true,
            message: describeError(error),
          },
          null,
          2
        )
      );
      process.exit(1);
    }
  });

await program.parseAsync();
