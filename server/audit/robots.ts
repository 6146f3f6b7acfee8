import type { RobotsGroupSummary } from "@shared/audit-types";

export type RobotsGroup = RobotsGroupSummary;

/**
 * Splits robots.txt into user-agent groups. Consecutive `User-agent` lines
 * open a single group; the first rule line after them closes the header.
 * Agent names are lowercased, rule paths kept verbatim.
 */
export function parseRobotsTxt(content: string): RobotsGroup[] {
  const groups: RobotsGroup[] = [];
  let current: RobotsGroup | null = null;
  let collectingAgents = false;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, "").trim();
    if (!line) continue;

    const separator = line.indexOf(":");
    if (separator === -1) continue;

    const directive = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();

    if (directive === "user-agent") {
      if (!current || !collectingAgents) {
        current = { agents: [], allows: [], disallows: [] };
        groups.push(current);
        collectingAgents = true;
      }
      current.agents.push(value.toLowerCase());
      continue;
    }

    collectingAgents = false;
    if (!current) continue;

    if (directive === "allow") {
      current.allows.push(value);
    } else if (directive === "disallow") {
      current.disallows.push(value);
    }
  }

  return groups;
}

/**
 * True when a wildcard group shuts out the whole site: `Disallow: /` with no
 * `Allow` rule in the same group. All wildcard groups are considered.
 */
export function blocksAllCrawlers(groups: RobotsGroup[]): boolean {
  return groups.some(
    (group) =>
      group.agents.includes("*") &&
      group.disallows.includes("/") &&
      group.allows.length === 0
  );
}

/** Disallow rules addressed to named bots, e.g. `gptbot: Disallow /`. */
export function botSpecificDisallows(groups: RobotsGroup[]): string[] {
  return groups.flatMap((group) =>
    group.agents
      .filter((agent) => agent !== "*")
      .flatMap((agent) =>
        group.disallows.filter(Boolean).map((path) => `${agent}: Disallow ${path}`)
      )
  );
}
