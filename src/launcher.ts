import { spawnSync } from "node:child_process";
import { createInterface } from "node:readline";
import type { AccountRecord, LauncherConfig } from "./types";
import { ENV_ACCOUNT } from "./constants";
import {
  buildAccountEnv,
  buildKeyMap,
  findAccountIndex,
  readLastChoice,
  saveLastChoice,
} from "./accounts";
import { formatAccountMenu, tabColorSequence, TAB_COLOR_RESET } from "./ui/terminal";

export type PromptFn = (question: string) => Promise<string>;

export type Selection =
  | { kind: "account"; index: number }
  | { kind: "cancelled" }
  | { kind: "configure" }
  | { kind: "unknown"; id: string };

export interface SelectOptions {
  env: NodeJS.ProcessEnv;
  requested?: string;
  prompt: PromptFn;
  isTty: boolean;
  lastChoicePath?: string;
}

export function promptLine(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  return new Promise((resolve) => {
    // EOF on stdin cancels.
    rl.once("close", () => resolve("q"));
    rl.question(question, (answer) => {
      resolve(answer);
      rl.close();
    });
  });
}

/**
 * Pick an account: re-entry through CLAUDE_ACCOUNT, an explicit id, the only
 * configured account, or the interactive menu, in that order. A hotkey bound
 * to `c` shadows the configure entry.
 */
export async function selectAccount(
  accounts: readonly AccountRecord[],
  options: SelectOptions
): Promise<Selection> {
  const existing = (options.env[ENV_ACCOUNT] || "").toLowerCase();
  if (existing) {
    const index = findAccountIndex(accounts, existing);
    if (index !== -1) return { kind: "account", index };
  }

  if (options.requested) {
    const index = findAccountIndex(accounts, options.requested.toLowerCase());
    return index === -1 ? { kind: "unknown", id: options.requested } : { kind: "account", index };
  }

  if (accounts.length === 1) return { kind: "account", index: 0 };

  const keys = buildKeyMap(accounts);
  const defaultId = readLastChoice(accounts, options.lastChoicePath, options.env);
  let question = formatAccountMenu(accounts, defaultId, options.isTty);

  for (;;) {
    const answer = (await options.prompt(question)).trim().toLowerCase();
    let chosen: string | undefined;
    if (answer === "") chosen = defaultId;
    else if (answer === "q") return { kind: "cancelled" };
    else chosen = keys.get(answer);

    if (chosen !== undefined) {
      saveLastChoice(chosen, options.lastChoicePath, options.env);
      return { kind: "account", index: findAccountIndex(accounts, chosen) };
    }
    if (answer === "c") return { kind: "configure" };
    question = `Unknown choice '${answer}'. Try again > `;
  }
}

/** Run the configured binary as the account at `index`; returns its exit code. */
export function launchAccount(
  config: LauncherConfig,
  index: number,
  args: string[],
  baseEnv: NodeJS.ProcessEnv = process.env
): number {
  const env = buildAccountEnv(baseEnv, config.accounts, index);
  const tab = tabColorSequence(config.accounts[index].color);
  if (tab) process.stdout.write(tab);

  try {
    const result = spawnSync(config.claude_exe, args, { env, stdio: "inherit" });
    if (result.error) {
      console.error(`Failed to launch ${config.claude_exe}: ${result.error.message}`);
      return 1;
    }
    return result.status ?? 1;
  } finally {
    process.stdout.write(TAB_COLOR_RESET);
  }
}
