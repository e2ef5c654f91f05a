export const ENV_FORBIDDEN_DIRS = "CLAUDE_ACCOUNT_FORBIDDEN_DIRS";
export const ENV_FORBIDDEN_DIR = "CLAUDE_ACCOUNT_FORBIDDEN_DIR";
export const ENV_ACCOUNT = "CLAUDE_ACCOUNT";
export const ENV_CONFIG_DIR = "CLAUDE_CONFIG_DIR";

export const UNKNOWN_ACCOUNT = "unknown";
export const DEFAULT_CONFIG_DIR_LABEL = "~/.claude";

/** Tool name -> the tool_input field holding the text to scan. */
export const TOOL_TARGET_FIELDS: ReadonlyMap<string, string> = new Map([
  ["Bash", "command"],
  ["Read", "file_path"],
  ["Write", "file_path"],
  ["Edit", "file_path"],
  ["MultiEdit", "file_path"],
  ["NotebookEdit", "notebook_path"],
  ["Glob", "path"],
  ["Grep", "path"],
]);

export const DEFAULT_COLORS = [
  "#cc3333",
  "#2ecc71",
  "#3498db",
  "#e67e22",
  "#9b59b6",
  "#1abc9c",
  "#e74c3c",
  "#f39c12",
  "#2980b9",
];

export const LAUNCHER_CONFIG_FILE = ".claude-launcher.json";
export const LAST_CHOICE_FILE = ".claude-account";
