import type { GuardConfig, GuardDecision, HookOutput, ToolRequest } from "../types";
import { findForbiddenMatch } from "./paths";
import { extractTargetText } from "./request";

export function formatDenyReason(account: string, configDir: string, display: string): string {
  return (
    `Cross-account access denied. ` +
    `You are running as the '${account}' account (config: ${configDir}). ` +
    `Access to ${display} is forbidden. ` +
    `That path belongs to a different account.`
  );
}

/**
 * Decide whether a tool call may proceed. Pure: everything it needs comes in
 * through `config` and `request`.
 */
export function evaluateRequest(config: GuardConfig, request: ToolRequest): GuardDecision {
  if (config.forbidden.length === 0) return { denied: false };

  const target = extractTargetText(request);
  if (!target) return { denied: false };

  const match = findForbiddenMatch(target, config.forbidden);
  if (!match) return { denied: false };

  const matched = match.normalized;
  const display = config.backslashDisplay ? matched.replace(/\//g, "\\") : matched;
  return {
    denied: true,
    matched,
    display,
    account: config.account,
    configDir: config.configDir,
    reason: formatDenyReason(config.account, config.configDir, display),
  };
}

export function toHookOutput(reason: string): HookOutput {
  return {
    hookSpecificOutput: {
      hookEventName: "PreToolUse",
      permissionDecision: "deny",
      reason,
    },
  };
}
