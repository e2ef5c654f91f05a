import { spawnSync } from "node:child_process";
import { join, resolve } from "node:path";

export const PROJECT_ROOT = resolve(__dirname, "..");
export const CLI_PATH = join(PROJECT_ROOT, "src", "index.ts");

const INHERITED_ACCOUNT_VARS = [
  "CLAUDE_ACCOUNT",
  "CLAUDE_ACCOUNT_FORBIDDEN_DIRS",
  "CLAUDE_ACCOUNT_FORBIDDEN_DIR",
  "CLAUDE_CONFIG_DIR",
  "ACCOUNTFENCE_AUDIT",
  "ACCOUNTFENCE_AUDIT_PATH",
  "ACCOUNTFENCE_AUDIT_DIR",
];

/** Parent env without account or audit settings; the audit log is switched off unless `extra` says otherwise. */
export function cleanEnv(extra: Record<string, string> = {}): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...process.env, ACCOUNTFENCE_AUDIT_DISABLED: "1" };
  for (const name of INHERITED_ACCOUNT_VARS) delete env[name];
  return { ...env, ...extra };
}

export interface RunResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export function runCli(args: string[], env: Record<string, string>, stdin = ""): RunResult {
  const proc = spawnSync(process.execPath, ["--import", "tsx", CLI_PATH, ...args], {
    cwd: PROJECT_ROOT,
    env: cleanEnv(env),
    input: stdin,
    encoding: "utf8",
  });
  return { exitCode: proc.status, stdout: proc.stdout, stderr: proc.stderr };
}

export function runHook(payload: unknown, env: Record<string, string>): RunResult {
  return runCli([], env, typeof payload === "string" ? payload : JSON.stringify(payload));
}
