import type { AuditConfig, Fetcher, SiteResult } from "./types";
import { AuditConfigSchema } from "./types";
import { crawlSite } from "./crawler";
import { createHttpFetcher } from "./fetcher";
import { calculateScores } from "./scorer";
import { generateAiInsights } from "./ai-insights";
import type { TextGenerator } from "./text-generator";
import type { HostRateLimiter } from "./rate-limiter";
import { log } from "./logger";

export interface AuditDependencies {
  fetcher?: Fetcher;
  rateLimiter?: HostRateLimiter;
  /** Without one, `aiAnalysis` records that text generation is not configured. */
  textGenerator?: TextGenerator | null;
}

export async function runAudit(
  config: Partial<AuditConfig> & { url: string },
  deps: AuditDependencies = {}
): Promise<SiteResult> {
  const startTime = Date.now();

  const validatedConfig = AuditConfigSchema.parse(config);
  const fetcher = deps.fetcher ?? createHttpFetcher(validatedConfig);

  const pages = await crawlSite(validatedConfig, { fetcher, rateLimiter: deps.rateLimiter });
  log(`Crawled ${pages.length} pages`);

  const insights = await generateAiInsights(pages, deps.textGenerator ?? null);

  const result = await calculateScores(pages, {
    fetcher,
    concurrency: validatedConfig.concurrency,
    insights,
  });

  log(`Audit finished in ${Date.now() - startTime}ms, site score ${result.siteScore}/100`);
  return result;
}

export { AuditConfigSchema } from "./types";
export type { AuditConfig, SiteResult } from "./types";
export { generateUnifiedReport, generateJsonReport } from "./report";
export { generateAiReport } from "./ai-insights";
export { createTextGenerator } from "./text-generator";
export type { TextGenerator } from "./text-generator";
