import { join } from "node:path";
import { homedir } from "node:os";
import type { AccountRecord, LauncherConfig } from "./types";
import { DEFAULT_COLORS } from "./constants";
import { getLauncherConfigPath, saveLauncherConfig, titleCase } from "./config";
import { formatAccountLine, getAnsiPalette } from "./ui/terminal";
import type { PromptFn } from "./launcher";

export interface ConfigureOptions {
  prompt: PromptFn;
  isTty: boolean;
  path?: string;
  home?: string;
}

async function ask(prompt: PromptFn, label: string, fallback?: string): Promise<string> {
  const question = fallback ? `${label} [${fallback}]: ` : `${label}: `;
  const answer = (await prompt(question)).trim();
  return answer || fallback || "";
}

async function askAccountNumber(prompt: PromptFn, accounts: readonly AccountRecord[], label: string): Promise<number | null> {
  accounts.forEach((account, i) => console.error(`  [${i + 1}] ${account.label} (${account.id})`));
  const choice = await ask(prompt, label);
  if (!/^\d+$/.test(choice)) {
    console.error("  Cancelled.");
    return null;
  }
  const index = Number.parseInt(choice, 10) - 1;
  if (index < 0 || index >= accounts.length) {
    console.error("  Invalid choice.");
    return null;
  }
  return index;
}

export async function addAccount(config: LauncherConfig, options: ConfigureOptions): Promise<LauncherConfig | null> {
  const { prompt } = options;
  const rawId = await ask(prompt, "  Account ID (e.g. work, client)");
  if (!rawId) {
    console.error("  Cancelled.");
    return null;
  }

  const id = rawId.toLowerCase().replace(/ /g, "-");
  if (config.accounts.some((account) => account.id === id)) {
    console.error(`  Account '${id}' already exists.`);
    return null;
  }

  const label = await ask(prompt, "  Display label", titleCase(id));
  const color = await ask(prompt, "  Hex color (#RRGGBB)", DEFAULT_COLORS[config.accounts.length % DEFAULT_COLORS.length]);
  const configDir = await ask(prompt, "  Config directory", join(options.home ?? homedir(), `.claude-${id}`));
  const hotkey = await ask(prompt, "  Hotkey letter", id[0]);

  const account: AccountRecord = { id, label, color, config_dir: configDir, hotkey: hotkey[0] };
  console.error(`  Added account '${id}'.`);
  return { ...config, accounts: [...config.accounts, account] };
}

export async function removeAccount(config: LauncherConfig, options: ConfigureOptions): Promise<LauncherConfig | null> {
  if (config.accounts.length <= 1) {
    console.error("  Cannot remove the last account.");
    return null;
  }

  const index = await askAccountNumber(options.prompt, config.accounts, "  Account number to remove");
  if (index === null) return null;

  const removed = config.accounts[index];
  console.error(`  Removed account '${removed.id}'.`);
  console.error(`  Note: config directory '${removed.config_dir ?? "~/.claude"}' was NOT deleted.`);
  return { ...config, accounts: config.accounts.filter((_, i) => i !== index) };
}

export async function editAccount(config: LauncherConfig, options: ConfigureOptions): Promise<LauncherConfig | null> {
  const { prompt } = options;
  const index = await askAccountNumber(prompt, config.accounts, "  Account number to edit");
  if (index === null) return null;

  const current = config.accounts[index];
  console.error(`  Editing '${current.id}' (press Enter to keep current value)`);
  const label = await ask(prompt, "  Label", current.label);
  const color = await ask(prompt, "  Color", current.color);
  // The default account keeps using ~/.claude.
  const configDir = current.config_dir === null ? null : await ask(prompt, "  Config dir", current.config_dir);
  const hotkey = await ask(prompt, "  Hotkey", current.hotkey);

  const updated: AccountRecord = { ...current, label, color, config_dir: configDir, hotkey };
  console.error(`  Updated account '${current.id}'.`);
  return { ...config, accounts: config.accounts.map((account, i) => (i === index ? updated : account)) };
}

function formatConfigureMenu(isTty: boolean): string {
  const { dim, bold, reset } = getAnsiPalette(isTty);
  return [
    `\n${bold}Configure Accounts${reset}`,
    "  [a] Add account",
    "  [r] Remove account",
    "  [e] Edit account",
    "  [l] List accounts",
    "  [q] Back to launcher",
    "",
    `${dim}Choice${reset} > `,
  ].join("\n");
}

/**
 * Interactive add/remove/edit/list loop. Every change is written to the
 * launcher config file right away; returns the config as last saved.
 */
export async function configureAccounts(config: LauncherConfig, options: ConfigureOptions): Promise<LauncherConfig> {
  const path = options.path ?? getLauncherConfigPath();
  const { bold, reset } = getAnsiPalette(options.isTty);
  let current = config;

  for (;;) {
    const choice = (await options.prompt(formatConfigureMenu(options.isTty))).trim().toLowerCase().slice(0, 1);
    let next: LauncherConfig | null = null;

    if (choice === "a") next = await addAccount(current, options);
    else if (choice === "r") next = await removeAccount(current, options);
    else if (choice === "e") next = await editAccount(current, options);
    else if (choice === "l") {
      console.error(`\n${bold}Current Accounts${reset}`);
      current.accounts.forEach((account, i) => console.error(formatAccountLine(account, i, options.isTty)));
    } else if (choice === "q") {
      return current;
    }

    if (next) {
      saveLauncherConfig(next, path);
      console.error(`Saved ${path}`);
      current = next;
    }
  }
}
