import type { Express, Request, Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import { runAudit, generateUnifiedReport, type AuditDependencies } from "./audit";
import { describeError } from "./audit/cli-options";
import { MAX_PAGES_LIMIT } from "./audit/types";

const AuditRequestSchema = z.object({
  url: z.string().min(1),
  maxPages: z.coerce.number().int().positive().max(MAX_PAGES_LIMIT).optional(),
  maxDepth: z.coerce.number().int().nonnegative().optional(),
  concurrency: z.coerce.number().int().positive().optional(),
  timeoutMs: z.coerce.number().int().positive().optional(),
  userAgent: z.string().optional(),
  format: z.enum(["json", "report"]).default("json"),
});

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  deps: AuditDependencies = {}
): Promise<Server> {
  app.post("/api/audit", async (req: Request, res: Response) => {
    const parsed = AuditRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: true,
        message: "Invalid request body",
        details: parsed.error.errors,
      });
      return;
    }

    try {
      const { format, ...config } = parsed.data;
      const result = await runAudit(config, deps);

      if (format === "report") {
        res.type("text/plain").send(generateUnifiedReport(result));
        return;
      }
      res.json(result);
    } catch (error) {
      res.status(500).json({
        error: true,
        message: describeError(error) || "An error occurred during the audit",
      });
    }
  });

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", service: "llm-ready-audit" });
  });

  return httpServer;
}
