import { isArchiveExtension } from '../archive/archive-extractor.service';

export type MultiPartName = {
  base: string;
  part: number;
  /** Lower-cased, with the leading dot. */
  ext: string;
};

const MULTI_PART_PATTERN = /^(?<base>.+)\.part(?<part>\d+)(?<ext>\.[^.]+)$/;

/** Strip trailing whitespace and map anything outside [A-Za-z0-9._] to `_`. */
export function sanitizeLockKey(raw: string): string {
  return raw.trimEnd().replace(/[^A-Za-z0-9._]/g, '_');
}

/** `<base>.part<N>.<zip|rar>`, or null for a standalone archive. */
export function parseMultiPart(fileName: string): MultiPartName | null {
  const groups = MULTI_PART_PATTERN.exec(fileName)?.groups;
  if (!groups) return null;
  const ext = groups.ext.toLowerCase();
  if (!isArchiveExtension(ext)) return null;
  return { base: groups.base, part: Number.parseInt(groups.part, 10), ext };
}

/** Group key: the base of a multi-part set, else the archive's own name. */
export function lockKeyFor(fileName: string): string {
  const multi = parseMultiPart(fileName);
  return sanitizeLockKey(multi ? multi.base : fileName);
}

/** Whether a file in the download directory belongs to the group `key`. */
export function belongsToLockKey(fileName: string, key: string): boolean {
  const sanitized = sanitizeLockKey(fileName);
  return sanitized === key || sanitized.startsWith(`${key}.`);
}
