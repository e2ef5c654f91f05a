import { readFileSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { homedir } from "node:os";
import type { AccountRecord } from "./types";
import {
  ENV_ACCOUNT,
  ENV_CONFIG_DIR,
  ENV_FORBIDDEN_DIR,
  ENV_FORBIDDEN_DIRS,
  LAST_CHOICE_FILE,
} from "./constants";

export function resolveConfigDir(account: AccountRecord): string | null {
  return account.config_dir ? resolve(account.config_dir) : null;
}

/** Config dirs of every account except the one at `index`, in account order. */
export function computeForbiddenDirs(
  accounts: readonly AccountRecord[],
  index: number,
  home: string = homedir()
): string[] {
  const defaultDir = join(home, ".claude");
  return accounts
    .filter((_, i) => i !== index)
    .map((account) => resolveConfigDir(account) ?? defaultDir);
}

export function buildAccountEnv(
  base: NodeJS.ProcessEnv,
  accounts: readonly AccountRecord[],
  index: number,
  home: string = homedir()
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...base };
  const account = accounts[index];
  env[ENV_ACCOUNT] = account.id;

  const forbidden = computeForbiddenDirs(accounts, index, home);
  if (forbidden.length > 0) {
    env[ENV_FORBIDDEN_DIRS] = forbidden.join(",");
    env[ENV_FORBIDDEN_DIR] = forbidden[0];
  } else {
    delete env[ENV_FORBIDDEN_DIRS];
    delete env[ENV_FORBIDDEN_DIR];
  }

  const configDir = resolveConfigDir(account);
  if (configDir) {
    env[ENV_CONFIG_DIR] = configDir;
  } else {
    delete env[ENV_CONFIG_DIR];
  }

  return env;
}

/** Keys `1`-`9` for the first nine accounts, then each unclaimed hotkey. */
export function buildKeyMap(accounts: readonly AccountRecord[]): Map<string, string> {
  const keys = new Map<string, string>();
  accounts.forEach((account, i) => {
    if (i < 9) keys.set(String(i + 1), account.id);
    const hotkey = account.hotkey.toLowerCase();
    if (hotkey && !keys.has(hotkey)) keys.set(hotkey, account.id);
  });
  return keys;
}

export function findAccountIndex(accounts: readonly AccountRecord[], id: string): number {
  return accounts.findIndex((account) => account.id === id);
}

export function getLastChoicePath(home: string = homedir()): string {
  return join(home, LAST_CHOICE_FILE);
}

export function readLastChoice(
  accounts: readonly AccountRecord[],
  path: string = getLastChoicePath(),
  env: NodeJS.ProcessEnv = process.env
): string {
  try {
    const text = readFileSync(path, "utf8").trim().toLowerCase();
    if (accounts.some((account) => account.id === text)) return text;
  } catch (error) {
    if (env.DEBUG) console.error(error);
  }
  return accounts[0].id;
}

export function saveLastChoice(
  choice: string,
  path: string = getLastChoicePath(),
  env: NodeJS.ProcessEnv = process.env
): void {
  try {
    writeFileSync(path, choice + "\n", "utf8");
  } catch (error) {
    if (env.DEBUG) console.error(error);
  }
}
