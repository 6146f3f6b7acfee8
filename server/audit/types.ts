import { z } from "zod";

export const MAX_PAGES_LIMIT = 50;

export const AuditConfigSchema = z.object({
  url: z.string().min(1),
  maxDepth: z.number().int().nonnegative().default(1),
  maxPages: z.number().int().positive().max(MAX_PAGES_LIMIT).default(MAX_PAGES_LIMIT),
  concurrency: z.number().int().positive().default(4),
  delayMs: z.number().int().nonnegative().default(500),
  timeoutMs: z.number().int().positive().default(10000),
  userAgent: z
    .string()
    .default("Mozilla/5.0 (compatible; LLM-Ready-Audit/1.0; +bot)"),
});

export type AuditConfig = z.infer<typeof AuditConfigSchema>;

export interface PageRecord {
  url: string;
  html: string | null;
  statusCode: number | null;
  error: string | null;
  depth: number;
}

export interface FetchResponse {
  url: string;
  html: string | null;
  statusCode: number | null;
  error: string | null;
}

export interface Fetcher {
  fetch(url: string): Promise<FetchResponse>;
}

export type {
  CheckResult,
  CheckName,
  PageChecks,
  PageScoreResult,
  SiteResult,
  ContentAnalysis,
  Recommendations,
} from "@shared/audit-types";
