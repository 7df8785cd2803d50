import { cp, lstat, rename, rm } from 'node:fs/promises';

export function errorCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return false;
    throw err;
  }
}

/** rename(2), falling back to copy + delete when source and target sit on different devices. */
export async function movePath(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (err) {
    if (errorCode(err) !== 'EXDEV') throw err;
    await cp(source, target, { recursive: true, errorOnExist: true, force: false });
    await rm(source, { recursive: true, force: true });
  }
}
