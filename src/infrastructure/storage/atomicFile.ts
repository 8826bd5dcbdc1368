import { access, mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { randomUUID } from 'crypto';
import type { z } from 'zod';
import { CorruptStateError } from '../../domain/errors';

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export interface PendingFile {
  path: string;
  data: string | Buffer;
}

/**
 * Stages every file in a sibling temp file, then renames them in order.
 * Nothing is renamed unless every temp file was written.
 */
export async function writeFilesAtomic(files: PendingFile[]): Promise<void> {
  const tempPaths: string[] = [];

  try {
    for (const file of files) {
      await mkdir(dirname(file.path), { recursive: true });
      const tempPath = `${file.path}.${randomUUID()}.tmp`;
      tempPaths.push(tempPath);
      await writeFile(tempPath, file.data);
    }
    for (const [i, file] of files.entries()) {
      await rename(tempPaths[i], file.path);
    }
  } catch (error) {
    await Promise.all(tempPaths.map((tempPath) => rm(tempPath, { force: true })));
    throw error;
  }
}

export async function writeFileAtomic(path: string, data: string | Buffer): Promise<void> {
  await writeFilesAtomic([{ path, data }]);
}

export async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  await writeFileAtomic(path, JSON.stringify(value, null, 2));
}

export async function readFileIfExists(path: string): Promise<Buffer | null> {
  try {
    return await readFile(path);
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (isMissingFile(error)) {
      return false;
    }
    throw error;
  }
}

/** Reads and validates a JSON file; null when it does not exist. */
export async function readJsonFile<T extends z.ZodTypeAny>(
  path: string,
  schema: T
): Promise<z.output<T> | null> {
  const raw = await readFileIfExists(path);
  if (raw === null) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.toString('utf-8'));
  } catch (error) {
    throw new CorruptStateError(`${path} is not valid JSON`, { cause: error });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new CorruptStateError(
      `${path} failed validation at "${issue?.path.join('.') ?? ''}": ${issue?.message ?? 'unknown issue'}`
    );
  }
  return result.data;
}
