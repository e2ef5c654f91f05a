export interface HookPayload {
  tool_name?: string;
  tool_input?: Record<string, unknown>;
}

export interface ToolRequest {
  toolName: string;
  toolInput: Record<string, unknown>;
}

export interface ForbiddenDirectory {
  raw: string;
  normalized: string;
  posixAlias: string | null;
}

export interface GuardConfig {
  forbidden: ForbiddenDirectory[];
  account: string;
  configDir: string;
  /** Render matches with backslashes (the first configured entry used them). */
  backslashDisplay: boolean;
}

export type GuardDecision =
  | { denied: false }
  | {
      denied: true;
      matched: string;
      display: string;
      account: string;
      configDir: string;
      reason: string;
    };

export interface HookOutput {
  hookSpecificOutput: {
    hookEventName: "PreToolUse";
    permissionDecision: "deny";
    reason: string;
  };
}

export interface AccountRecord {
  id: string;
  label: string;
  color: string;
  config_dir: string | null;
  hotkey: string;
}

export interface LauncherConfig {
  claude_exe: string;
  accounts: AccountRecord[];
}
