import { text } from "node:stream/consumers";
import { getGuardConfiguration, getLauncherConfigPath, loadLauncherConfig } from "./config";
import { TOOL_TARGET_FIELDS } from "./constants";
import { computeForbiddenDirs } from "./accounts";
import { logAudit } from "./audit";
import { printStats } from "./stats";
import { evaluateRequest, toHookOutput } from "./security/guard";
import { extractTargetText, parseToolRequest } from "./security/request";
import { formatAccountLine, formatDeniedMessage } from "./ui/terminal";
import { launchAccount, promptLine, selectAccount } from "./launcher";
import { configureAccounts } from "./configure";
import type { ToolRequest } from "./types";

const HOOK_TOOLS = Array.from(TOOL_TARGET_FIELDS.keys());

function printHelp(): void {
  console.log("AccountFence - keep coding-assistant accounts out of each other's config");
  console.log("Usage:");
  console.log("  accountfence                          PreToolUse hook (reads the tool call on stdin)");
  console.log("  accountfence --check <tool> <target>  Evaluate one request against the environment");
  console.log("  accountfence --launch [--account <id>] [-- args...]");
  console.log("  accountfence --accounts               List accounts and their forbidden dirs");
  console.log("  accountfence --stats                  Summarize the audit log");
  console.log("  accountfence --init                   Print the settings.json hook entry");
}

function printInit(): void {
  const settings = {
    hooks: {
      PreToolUse: [
        {
          matcher: HOOK_TOOLS.join("|"),
          hooks: [{ type: "command", command: "accountfence" }],
        },
      ],
    },
  };
  console.log("# Merge into each account's settings.json:");
  console.log(JSON.stringify(settings, null, 2));
}

function printAccounts(env: NodeJS.ProcessEnv): void {
  const config = loadLauncherConfig(getLauncherConfigPath(env));
  console.log(`Binary: ${config.claude_exe}`);
  config.accounts.forEach((account, i) => {
    console.log(formatAccountLine(account, i, process.stdout.isTTY));
    const forbidden = computeForbiddenDirs(config.accounts, i);
    if (forbidden.length > 0) console.log(`      forbidden: ${forbidden.join(", ")}`);
  });
}

function handleCheck(args: string[], env: NodeJS.ProcessEnv): number {
  const idx = args.indexOf("--check");
  const tool = args[idx + 1];
  const target = args[idx + 2];
  if (!tool || !target) {
    console.error("Usage: accountfence --check <tool> <target>");
    return 1;
  }

  const field = TOOL_TARGET_FIELDS.get(tool);
  if (!field) return 0;

  const request: ToolRequest = { toolName: tool, toolInput: { [field]: target } };
  const config = getGuardConfiguration(env);
  const decision = evaluateRequest(config, request);
  logAudit(request, target, decision, { source: "check", account: config.account }, env);
  if (!decision.denied) return 0;

  console.error(formatDeniedMessage(decision.reason, target, process.stderr.isTTY));
  return 2;
}

async function handleLaunch(args: string[], passthrough: string[], env: NodeJS.ProcessEnv): Promise<number> {
  const configPath = getLauncherConfigPath(env);
  const accountIdx = args.indexOf("--account");
  const requested = accountIdx !== -1 ? args[accountIdx + 1] : undefined;
  const isTty = process.stderr.isTTY;

  for (;;) {
    const config = loadLauncherConfig(configPath);
    const selection = await selectAccount(config.accounts, { env, requested, prompt: promptLine, isTty });

    if (selection.kind === "configure") {
      await configureAccounts(config, { prompt: promptLine, isTty, path: configPath });
      continue;
    }
    if (selection.kind === "cancelled") {
      console.error("Cancelled");
      return 1;
    }
    if (selection.kind === "unknown") {
      console.error(`Error: unknown account '${selection.id}'`);
      return 1;
    }
    return launchAccount(config, selection.index, passthrough, env);
  }
}

/**
 * PreToolUse hook. Always exits 0: a denial is signalled only by the JSON
 * document on stdout, and every failure allows the call.
 */
export async function handleHook(
  env: NodeJS.ProcessEnv,
  readInput: () => Promise<string> = () => text(process.stdin)
): Promise<number> {
  try {
    const config = getGuardConfiguration(env);
    if (config.forbidden.length === 0) return 0;

    const request = parseToolRequest(await readInput());
    if (!request) return 0;

    const target = extractTargetText(request);
    if (!target) return 0;

    const decision = evaluateRequest(config, request);
    logAudit(request, target, decision, { source: "hook", account: config.account }, env);
    if (decision.denied) {
      process.stdout.write(JSON.stringify(toHookOutput(decision.reason)));
    }
    return 0;
  } catch (error) {
    if (env.DEBUG) console.error(error);
    return 0;
  }
}

export async function main(argv: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const separator = argv.indexOf("--");
  const args = separator === -1 ? argv : argv.slice(0, separator);
  const passthrough = separator === -1 ? [] : argv.slice(separator + 1);

  if (args.includes("--help") || args.includes("-h")) {
    printHelp();
    return 0;
  }

  if (args.includes("--init")) {
    printInit();
    return 0;
  }

  if (args.includes("--stats")) {
    printStats(env);
    return 0;
  }

  if (args.includes("--accounts")) {
    printAccounts(env);
    return 0;
  }

  if (args.includes("--check")) {
    return handleCheck(args, env);
  }

  if (args.includes("--launch")) {
    return handleLaunch(args, passthrough, env);
  }

  return handleHook(env);
}
