import { appendFileSync, existsSync, mkdirSync, statSync, renameSync } from "node:fs";
import { dirname, join } from "node:path";
import { homedir, hostname } from "node:os";
import { createHash } from "node:crypto";
import type { GuardDecision, ToolRequest } from "./types";

export interface AuditMeta {
  source?: "hook" | "check";
  account?: string;
}

export interface AuditEntry {
  v: 1;
  id: string;
  timestamp: string;
  user: string;
  host: string;
  cwd: string;
  account: string;
  tool: string;
  target: string;
  decision: "denied" | "allowed";
  matched?: string;
  reason?: string;
  source?: AuditMeta["source"];
}

const MAX_LOG_BYTES = 1 * 1024 * 1024;

export function getAuditDir(env: NodeJS.ProcessEnv = process.env): string {
  const dir = (env.ACCOUNTFENCE_AUDIT_DIR || "").trim();
  return dir.length > 0 ? dir : join(homedir(), ".accountfence");
}

export function getAuditPath(env: NodeJS.ProcessEnv = process.env): string {
  const p = (env.ACCOUNTFENCE_AUDIT_PATH || "").trim();
  return p.length > 0 ? p : join(getAuditDir(env), "audit.log");
}

/**
 * The log is opt-in: a hook run otherwise does one stdin read and at most one
 * stdout write. ACCOUNTFENCE_AUDIT_DISABLED=1 wins over every opt-in.
 */
export function isAuditEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  if ((env.ACCOUNTFENCE_AUDIT_DISABLED || "").trim() === "1") return false;
  return (
    (env.ACCOUNTFENCE_AUDIT || "").trim() === "1" ||
    (env.ACCOUNTFENCE_AUDIT_PATH || "").trim().length > 0 ||
    (env.ACCOUNTFENCE_AUDIT_DIR || "").trim().length > 0
  );
}

function rotateIfNeeded(logPath: string): void {
  if (!existsSync(logPath)) return;
  if (statSync(logPath).size <= MAX_LOG_BYTES) return;
  renameSync(logPath, logPath + ".1");
}

export function buildAuditEntry(
  request: ToolRequest,
  target: string,
  decision: GuardDecision,
  meta: AuditMeta = {},
  env: NodeJS.ProcessEnv = process.env
): AuditEntry {
  return {
    v: 1,
    id: createHash("sha256").update(target).digest("hex").slice(0, 12),
    timestamp: new Date().toISOString(),
    user: env.USER || env.USERNAME || "unknown",
    host: hostname(),
    cwd: process.cwd(),
    account: decision.denied ? decision.account : meta.account || "unknown",
    tool: request.toolName,
    target,
    decision: decision.denied ? "denied" : "allowed",
    matched: decision.denied ? decision.matched : undefined,
    reason: decision.denied ? decision.reason : undefined,
    source: meta.source,
  };
}

/** Append one decision to the audit log when it is enabled. Never throws. */
export function logAudit(
  request: ToolRequest,
  target: string,
  decision: GuardDecision,
  meta: AuditMeta = {},
  env: NodeJS.ProcessEnv = process.env
): void {
  if (!isAuditEnabled(env)) return;
  try {
    const logPath = getAuditPath(env);
    const dir = dirname(logPath);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    rotateIfNeeded(logPath);

    const entry = buildAuditEntry(request, target, decision, meta, env);
    appendFileSync(logPath, JSON.stringify(entry) + "\n");
  } catch (error) {
    if (env.DEBUG) console.error("[AccountFence] audit write failed:", error);
  }
}
