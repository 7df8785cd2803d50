import { readFileSync } from 'node:fs';

export type EnvLike = Record<string, string | undefined>;

function normalizeFileSecret(raw: string): string {
  // Keep inner newlines, drop the one most editors append.
  return raw.replace(/\r\n/g, '\n').replace(/\n$/, '');
}

/**
 * Resolve `key` from the environment, falling back to the file named by
 * `${key}_FILE` (Docker/Kubernetes secrets). Unreadable files resolve to ''.
 */
export function readEnvSecret(env: EnvLike, key: string): string {
  const direct = env[key]?.trim() ?? '';
  if (direct) return direct;

  const filePath = env[`${key}_FILE`]?.trim() ?? '';
  if (!filePath) return '';

  try {
    return normalizeFileSecret(readFileSync(filePath, 'utf8')).trim();
  } catch {
    // Callers treat an empty secret as "not configured".
    return '';
  }
}
