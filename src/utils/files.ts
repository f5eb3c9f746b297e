import fs from 'node:fs';
import path from 'node:path';

export function safeName(value: string): string {
  return value.replace(/[/\\]/g, '_');
}

export function ensureDirectory(directory: string) {
  fs.mkdirSync(directory, { recursive: true });
}

export function readJsonFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    return undefined;
  }
  const contents = fs.readFileSync(filePath, 'utf-8');
  try {
    return JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse ${filePath}: ${message}`);
  }
}

export function writeJsonAtomic(filePath: string, data: unknown) {
  ensureDirectory(path.dirname(filePath));
  const tempPath = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
  fs.renameSync(tempPath, filePath);
}

export function toPosixRelative(from: string, to: string): string {
  return path.relative(from, to).split(path.sep).join('/');
}
