import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { buildAuditEntry, isAuditEnabled, logAudit } from "../src/audit";
import { formatStats } from "../src/stats";
import type { GuardDecision, ToolRequest } from "../src/types";

const REQUEST: ToolRequest = { toolName: "Bash", toolInput: { command: "cat /b/x" } };
const DENIED: GuardDecision = {
  denied: true,
  matched: "/b",
  display: "/b",
  account: "work",
  configDir: "/home/alice/.claude-work",
  reason: "Cross-account access denied.",
};

describe("audit log", () => {
  const saved = {
    path: process.env.ACCOUNTFENCE_AUDIT_PATH,
    disabled: process.env.ACCOUNTFENCE_AUDIT_DISABLED,
  };
  let dir = "";
  let logPath = "";

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "accountfence-audit-"));
    logPath = join(dir, "nested", "audit.log");
    process.env.ACCOUNTFENCE_AUDIT_PATH = logPath;
    delete process.env.ACCOUNTFENCE_AUDIT_DISABLED;
  });

  afterEach(() => {
    if (saved.path === undefined) delete process.env.ACCOUNTFENCE_AUDIT_PATH;
    else process.env.ACCOUNTFENCE_AUDIT_PATH = saved.path;
    if (saved.disabled === undefined) delete process.env.ACCOUNTFENCE_AUDIT_DISABLED;
    else process.env.ACCOUNTFENCE_AUDIT_DISABLED = saved.disabled;
    rmSync(dir, { recursive: true, force: true });
  });

  test("writes a structured entry for a denial", () => {
    logAudit(REQUEST, "cat /b/x", DENIED, { source: "hook", account: "work" });

    const entry = JSON.parse(readFileSync(logPath, "utf8").trim());
    expect(entry.v).toBe(1);
    expect(entry.decision).toBe("denied");
    expect(entry.account).toBe("work");
    expect(entry.tool).toBe("Bash");
    expect(entry.target).toBe("cat /b/x");
    expect(entry.matched).toBe("/b");
    expect(entry.source).toBe("hook");
    expect(entry.id).toHaveLength(12);
  });

  test("records allowed requests without a match", () => {
    logAudit(REQUEST, "ls", { denied: false }, { source: "check", account: "personal" });

    const entry = JSON.parse(readFileSync(logPath, "utf8").trim());
    expect(entry.decision).toBe("allowed");
    expect(entry.account).toBe("personal");
    expect(entry.matched).toBeUndefined();
  });

  test("writes nothing when disabled", () => {
    process.env.ACCOUNTFENCE_AUDIT_DISABLED = "1";
    logAudit(REQUEST, "cat /b/x", DENIED);
    expect(existsSync(logPath)).toBe(false);
  });
});

describe("isAuditEnabled", () => {
  test("is off by default", () => {
    expect(isAuditEnabled({})).toBe(false);
    expect(isAuditEnabled({ ACCOUNTFENCE_AUDIT: "0" })).toBe(false);
  });

  test("turns on with an explicit flag, a path or a directory", () => {
    expect(isAuditEnabled({ ACCOUNTFENCE_AUDIT: "1" })).toBe(true);
    expect(isAuditEnabled({ ACCOUNTFENCE_AUDIT_PATH: "/var/log/fence.log" })).toBe(true);
    expect(isAuditEnabled({ ACCOUNTFENCE_AUDIT_DIR: "/var/log/fence" })).toBe(true);
  });

  test("the disable switch wins", () => {
    expect(isAuditEnabled({ ACCOUNTFENCE_AUDIT: "1", ACCOUNTFENCE_AUDIT_DISABLED: "1" })).toBe(false);
  });
});

describe("buildAuditEntry", () => {
  test("takes the user from the given environment", () => {
    const entry = buildAuditEntry(REQUEST, "cat /b/x", DENIED, { source: "hook" }, { USER: "test-user" });
    expect(entry.user).toBe("test-user");
    expect(entry.account).toBe("work");
  });
});

describe("formatStats", () => {
  test("counts decisions and denied directories", () => {
    const lines = [
      JSON.stringify({ decision: "denied", matched: "/b", account: "work" }),
      JSON.stringify({ decision: "allowed", account: "work" }),
      "not json",
      JSON.stringify({ decision: "denied", matched: "/b", account: "work" }),
      JSON.stringify({ decision: "denied", matched: "/a", account: "client" }),
    ].join("\n");

    const output = formatStats(lines).split("\n");
    expect(output).toContain("Total Requests Checked: 4");
    expect(output).toContain("🚫 Denied: 3");
    expect(output).toContain("✅ Allowed: 1");
    expect(output).toContain("   - /b: 2");
    expect(output).toContain("   - /a: 1");
    expect(output).toContain("   - work: 2");
    expect(output).toContain("   - client: 1");
  });
});
