import { readFileSync, existsSync } from "node:fs";
import { z } from "zod";
import { getAuditPath } from "./audit";

const StatsEntrySchema = z.object({
  decision: z.string().optional(),
  matched: z.string().optional(),
  account: z.string().optional(),
});

type StatsEntry = z.infer<typeof StatsEntrySchema>;

function parseEntry(line: string): StatsEntry | null {
  try {
    const parsed = StatsEntrySchema.safeParse(JSON.parse(line));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function topCounts(values: string[], limit: number): Array<[string, number]> {
  const counts: Record<string, number> = {};
  values.forEach((v) => {
    counts[v] = (counts[v] || 0) + 1;
  });
  return Object.entries(counts)
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit);
}

export function formatStats(content: string): string {
  const entries = content
    .split("\n")
    .filter(Boolean)
    .map(parseEntry)
    .filter((e): e is StatsEntry => e !== null);

  const total = entries.length;
  const denied = entries.filter((e) => e.decision === "denied");
  const allowed = total - denied.length;

  const topDirs = topCounts(
    denied.map((e) => e.matched).filter((m): m is string => Boolean(m)),
    5
  );
  const byAccount = topCounts(
    denied.map((e) => e.account).filter((a): a is string => Boolean(a)),
    Number.POSITIVE_INFINITY
  );

  return `
🛡️  AccountFence Statistics
━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
Total Requests Checked: ${total}
🚫 Denied: ${denied.length}
✅ Allowed: ${allowed}

Top Denied Directories:
${topDirs.map(([d, c]) => `   - ${d}: ${c}`).join("\n")}

Denials By Account:
${byAccount.map(([a, c]) => `   - ${a}: ${c}`).join("\n")}
━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
`;
}

export function printStats(env: NodeJS.ProcessEnv = process.env): void {
  const logPath = getAuditPath(env);
  if (!existsSync(logPath)) {
    console.log("No audit log found.");
    return;
  }
  console.log(formatStats(readFileSync(logPath, "utf8")));
}
