// Diagnostics go to stderr; stdout carries the report.

export function log(message: string, source = "audit"): void {
  console.error(`[${source}] ${message}`);
}

export function warn(message: string, source = "audit"): void {
  console.warn(`[${source}] ${message}`);
}
