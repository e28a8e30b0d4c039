import { readFileSync } from 'node:fs';

export interface HostFileResult {
  hosts: string[];
  error?: string;
}

export function parseHostList(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'));
}

export function readHostFile(path: string): HostFileResult {
  try {
    return { hosts: parseHostList(readFileSync(path, 'utf8')) };
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code === 'ENOENT') {
      return { hosts: [], error: `Input file '${path}' not found.` };
    }
    if (code === 'EACCES') {
      return { hosts: [], error: `Permission denied reading file '${path}'.` };
    }
    const message = err instanceof Error ? err.message : String(err);
    return { hosts: [], error: `Error reading input file '${path}': ${message}` };
  }
}
