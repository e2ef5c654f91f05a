import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import type { AccountRecord, GuardConfig, LauncherConfig } from "./types";
import {
  DEFAULT_CONFIG_DIR_LABEL,
  ENV_ACCOUNT,
  ENV_CONFIG_DIR,
  ENV_FORBIDDEN_DIR,
  ENV_FORBIDDEN_DIRS,
  LAUNCHER_CONFIG_FILE,
  UNKNOWN_ACCOUNT,
} from "./constants";
import { toForbiddenDirectory } from "./security/paths";

type Env = Record<string, string | undefined>;

export function readForbiddenDirs(env: Env): string[] {
  const list = env[ENV_FORBIDDEN_DIRS] || "";
  if (list) {
    return list
      .split(",")
      .map((dir) => dir.trim())
      .filter(Boolean);
  }

  const single = (env[ENV_FORBIDDEN_DIR] || "").trim();
  return single ? [single] : [];
}

export function getGuardConfiguration(env: Env = process.env): GuardConfig {
  const rawDirs = readForbiddenDirs(env);

  return {
    // "/" and "\\" collapse to nothing and would match every request.
    forbidden: rawDirs.map(toForbiddenDirectory).filter((dir) => dir.normalized.length > 0),
    account: env[ENV_ACCOUNT] || UNKNOWN_ACCOUNT,
    configDir: env[ENV_CONFIG_DIR] || DEFAULT_CONFIG_DIR_LABEL,
    backslashDisplay: rawDirs.length > 0 && rawDirs[0].includes("\\"),
  };
}

const AccountSchema = z.object({
  id: z.string().optional(),
  label: z.string().optional(),
  color: z.string().optional(),
  config_dir: z.string().nullable().optional(),
  hotkey: z.string().optional(),
});

const LauncherConfigSchema = z.object({
  claude_exe: z.string().min(1).optional(),
  accounts: z.array(AccountSchema).optional(),
});

type FileAccount = z.infer<typeof AccountSchema>;

export function getLauncherConfigPath(env: Env = process.env): string {
  const override = (env.ACCOUNTFENCE_LAUNCHER_CONFIG || "").trim();
  return override.length > 0 ? override : join(homedir(), LAUNCHER_CONFIG_FILE);
}

export function defaultClaudeExe(home: string = homedir(), platform: NodeJS.Platform = process.platform): string {
  return join(home, ".local", "bin", platform === "win32" ? "claude.exe" : "claude");
}

export function defaultLauncherConfig(): LauncherConfig {
  return {
    claude_exe: defaultClaudeExe(),
    accounts: [
      {
        id: "default",
        label: "Default",
        color: "#ffffff",
        config_dir: null,
        hotkey: "d",
      },
    ],
  };
}

export function titleCase(value: string): string {
  return value.replace(/[A-Za-z]+/g, (word) => word[0].toUpperCase() + word.slice(1).toLowerCase());
}

export function withAccountDefaults(account: FileAccount): AccountRecord {
  const id = account.id ?? (account.label ?? "default").toLowerCase();
  return {
    id,
    label: account.label ?? titleCase(id),
    color: account.color ?? "#ffffff",
    config_dir: account.config_dir || null,
    hotkey: account.hotkey ?? (id ? id[0] : "x"),
  };
}

export function loadLauncherConfig(path: string = getLauncherConfigPath()): LauncherConfig {
  if (!existsSync(path)) return defaultLauncherConfig();

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`Warning: failed to load ${path}: ${message}`);
    return defaultLauncherConfig();
  }

  const parsed = LauncherConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    console.warn(`Warning: invalid config at ${path}: ${issues}`);
    return defaultLauncherConfig();
  }

  const accounts = parsed.data.accounts ?? [];
  if (accounts.length === 0) {
    console.warn(`Warning: no accounts in ${path}, using defaults`);
    return defaultLauncherConfig();
  }

  return {
    claude_exe: parsed.data.claude_exe ?? defaultClaudeExe(),
    accounts: accounts.map(withAccountDefaults),
  };
}

/** Validate against the file schema and write the launcher config back as indented JSON. */
export function saveLauncherConfig(config: LauncherConfig, path: string = getLauncherConfigPath()): void {
  const data = LauncherConfigSchema.parse(config);
  writeFileSync(path, JSON.stringify(data, null, 2) + "\n", "utf8");
}
