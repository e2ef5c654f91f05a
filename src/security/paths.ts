import type { ForbiddenDirectory } from "../types";

const DRIVE_PATH = /^([a-z]):\/(.*)$/;

export function normalizeForbiddenPath(path: string): string {
  let normalized = path.replace(/\\/g, "/").toLowerCase();
  while (normalized.endsWith("/")) {
    normalized = normalized.slice(0, -1);
  }
  return normalized;
}

/**
 * Rewrite a normalized drive path into the mount form used by MSYS2 and
 * Git Bash shells: `c:/users/x` becomes `/c/users/x`.
 */
export function toPosixAlias(normalized: string): string | null {
  const match = DRIVE_PATH.exec(normalized);
  if (!match) return null;
  return `/${match[1]}/${match[2]}`;
}

export function toForbiddenDirectory(raw: string): ForbiddenDirectory {
  const normalized = normalizeForbiddenPath(raw);
  return { raw, normalized, posixAlias: toPosixAlias(normalized) };
}

/**
 * Return the first forbidden directory (in configuration order) that appears
 * anywhere in `text`, in forward-slash, backslash or drive-mount spelling.
 * Plain substring containment; no segment-boundary check.
 */
export function findForbiddenMatch(
  text: string,
  forbidden: readonly ForbiddenDirectory[]
): ForbiddenDirectory | null {
  const lowered = text.toLowerCase();
  const forward = lowered.replace(/\\/g, "/");

  for (const dir of forbidden) {
    if (forward.includes(dir.normalized)) return dir;
    if (lowered.includes(dir.normalized.replace(/\//g, "\\"))) return dir;
    if (dir.posixAlias && lowered.includes(dir.posixAlias)) return dir;
  }
  return null;
}
