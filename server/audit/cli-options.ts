import { z } from "zod";
import { AuditConfigSchema, type AuditConfig } from "./types";
import { warn } from "./logger";

export const OutputFormatSchema = z.enum(["report", "json"]);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export interface RawCliOptions {
  depth: string;
  output?: string;
  format: string;
  aiReport?: boolean;
  openaiKey?: string;
  maxPages: string;
  concurrency: string;
  delay: string;
  timeout: string;
  userAgent?: string;
}

export interface CliSettings {
  config: AuditConfig;
  format: OutputFormat;
  output?: string;
  aiReport: boolean;
  openaiKey?: string;
}

export function parseCliOptions(
  url: string,
  options: RawCliOptions,
  env: NodeJS.ProcessEnv = process.env
): CliSettings {
  const config = AuditConfigSchema.parse({
    url,
    maxDepth: parseInt(options.depth, 10),
    maxPages: parseInt(options.maxPages, 10),
    concurrency: parseInt(options.concurrency, 10),
    delayMs: parseInt(options.delay, 10),
    timeoutMs: parseInt(options.timeout, 10),
    ...(options.userAgent ? { userAgent: options.userAgent } : {}),
  });

  return {
    config,
    format: OutputFormatSchema.parse(options.format),
    output: options.output,
    aiReport: Boolean(options.aiReport),
    openaiKey: options.openaiKey || env.OPENAI_API_KEY || undefined,
  };
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function loadLocalEnvFiles(): void {
  if (typeof process.loadEnvFile !== "function") {
    return;
  }

  for (const envPath of [".env.local", ".env"]) {
    try {
      process.loadEnvFile(envPath);
    } catch (error) {
      if (!isMissingFileError(error)) {
        warn(`Failed to load ${envPath}: ${String(error)}`, "cli");
      }
    }
  }
}

export function describeError(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues
      .map((issue) => `${issue.path.join(".") || "value"}: ${issue.message}`)
      .join("; ");
  }
  if (error instanceof Error) {
    return error.message || "Unknown error occurred";
  }
  return String(error);
}
