import { accessSync, constants } from 'node:fs';
import { delimiter, join } from 'node:path';

export function isExecutable(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export function which(cmd: string, pathEnv: string | undefined = process.env.PATH): string | null {
  const paths = pathEnv?.split(delimiter).filter(Boolean) ?? [];
  for (const p of paths) {
    const full = join(p, cmd);
    if (isExecutable(full)) return full;
  }
  return null;
}
