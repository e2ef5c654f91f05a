import type { AccountRecord } from "../types";

export interface AnsiPalette {
  red: string;
  yellow: string;
  cyan: string;
  dim: string;
  gray: string;
  bold: string;
  reset: string;
}

export function getAnsiPalette(isTty: boolean): AnsiPalette {
  return {
    red: isTty ? "\x1b[31m" : "",
    yellow: isTty ? "\x1b[33m" : "",
    cyan: isTty ? "\x1b[36m" : "",
    dim: isTty ? "\x1b[2m" : "",
    gray: isTty ? "\x1b[90m" : "",
    bold: isTty ? "\x1b[1m" : "",
    reset: isTty ? "\x1b[0m" : "",
  };
}

export type Rgb = [number, number, number];

/** Parse `#RRGGBB` or `RRGGBB`. */
export function hexToRgb(color: string): Rgb | null {
  const hex = color.replace(/^#+/, "");
  if (!/^[0-9a-fA-F]{6}$/.test(hex)) return null;
  return [
    Number.parseInt(hex.slice(0, 2), 16),
    Number.parseInt(hex.slice(2, 4), 16),
    Number.parseInt(hex.slice(4, 6), 16),
  ];
}

/** Nearest xterm-256 index: grayscale ramp for neutral colors, else the 6x6x6 cube. */
export function rgbToAnsi256([r, g, b]: Rgb): number {
  if (r === g && g === b) {
    if (r < 8) return 16;
    if (r > 248) return 231;
    return Math.round(((r - 8) / 247) * 24) + 232;
  }

  const ri = Math.round((r / 255) * 5);
  const gi = Math.round((g / 255) * 5);
  const bi = Math.round((b / 255) * 5);
  return 16 + 36 * ri + 6 * gi + bi;
}

export function accountColor(color: string, isTty: boolean): string {
  if (!isTty) return "";
  const rgb = hexToRgb(color);
  return rgb ? `\x1b[38;5;${rgbToAnsi256(rgb)}m` : "";
}

// Windows Terminal tab color (OSC 4;264) and its reset (OSC 104;264).
export const TAB_COLOR_RESET = "\x1b]104;264\x07";

export function tabColorSequence(color: string): string | null {
  const rgb = hexToRgb(color);
  if (!rgb) return null;
  const [r, g, b] = rgb.map((c) => c.toString(16).padStart(2, "0"));
  return `\x1b]4;264;rgb:${r}/${g}/${b}\x07`;
}

export function formatAccountMenu(
  accounts: readonly AccountRecord[],
  defaultId: string,
  isTty: boolean
): string {
  const { dim, bold, reset } = getAnsiPalette(isTty);
  const lines = [`\n${bold}Select Account${reset}`];

  accounts.forEach((account, i) => {
    const color = accountColor(account.color, isTty);
    const keyHint = account.hotkey ? `${i + 1}/${account.hotkey}` : `${i + 1}`;
    const marker = account.id === defaultId ? ` ${dim}(default)${reset}` : "";
    lines.push(`  ${color}[${keyHint}]${isTty ? reset : ""} ${account.label}${marker}`);
  });

  lines.push(`  ${dim}[c]${reset} Configure accounts...`);

  const numbers = accounts.slice(0, 9).map((_, i) => String(i + 1));
  const hotkeys = accounts.map((account) => account.hotkey).filter(Boolean);
  const hint = numbers.join("/") + (hotkeys.length > 0 ? " or " + hotkeys.join("/") : "");

  lines.push("");
  lines.push(`${dim}Press ${hint}, Enter=default, c=config, q=quit${reset} > `);
  return lines.join("\n");
}

export function formatAccountLine(account: AccountRecord, index: number, isTty: boolean): string {
  const { reset } = getAnsiPalette(isTty);
  const color = accountColor(account.color, isTty);
  const dir = account.config_dir || "~/.claude (default)";
  return (
    `  ${color}[${index + 1}]${reset} ${account.label} ` +
    `(id=${account.id}, color=${account.color}, hotkey=${account.hotkey}, dir=${dir})`
  );
}

export function formatDeniedMessage(reason: string, target: string, isTty: boolean): string {
  const { red, yellow, cyan, dim, gray, bold, reset } = getAnsiPalette(isTty);
  const line = `${gray}━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━${reset}`;

  return (
    `\n${red}🛡️ ${reset}AccountFence ${red}DENIED${reset}: ${reason}\n` +
    `${line}\n` +
    `${bold}${yellow}TARGET:${reset} ${cyan}${target}${reset}\n` +
    `${line}\n` +
    `${dim}Switch accounts with: accountfence --launch${reset}`
  );
}
