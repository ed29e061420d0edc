import fs from 'node:fs';
import { z } from 'zod';
import { errorMessage } from './errors.js';

export const FileContentSchema = z.object({
  filepath: z.string(),
  content: z.string().nullable(),
});

/**
 * One regression test as produced by the scrapers. Only the fields this tool
 * reads or writes are validated; everything else is carried through untouched.
 */
export const TestEntrySchema = z
  .object({
    url: z.string().min(1),
    base_hash: z.string().default(''),
    new_hash: z.string().default(''),
    exists: z.boolean().default(false),
    git_diff: z.string().nullable().optional(),
    old_file_versions: z.array(FileContentSchema).nullable().optional(),
    new_file_versions: z.array(FileContentSchema).nullable().optional(),
  })
  .passthrough();

export const EntryFileSchema = z.object({ list: z.array(z.unknown()) }).passthrough();

export type FileContent = z.infer<typeof FileContentSchema>;
export type TestEntry = z.infer<typeof TestEntrySchema>;
export type EntryFile = z.infer<typeof EntryFileSchema>;

export interface LoadedEntries {
  file: EntryFile;
  /** Valid entries with their position in `file.list`. */
  entries: Array<{ index: number; entry: TestEntry }>;
  /** Positions of records that failed validation and are left as they were. */
  invalid: number[];
}

export class EntryFileError extends Error {
  constructor(
    readonly filePath: string,
    detail: string,
  ) {
    super(`Could not load ${filePath}: ${detail}`);
    this.name = 'EntryFileError';
  }
}

export function parseEntryFile(json: string, filePath = '<input>'): LoadedEntries {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new EntryFileError(filePath, `malformed JSON (${errorMessage(err)})`);
  }

  const parsed = EntryFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new EntryFileError(filePath, `expected an object with a "list" array`);
  }

  const entries: LoadedEntries['entries'] = [];
  const invalid: number[] = [];
  parsed.data.list.forEach((record, index) => {
    const entry = TestEntrySchema.safeParse(record);
    if (entry.success) {
      entries.push({ index, entry: entry.data });
    } else {
      console.warn(`Skipping malformed entry #${index + 1}: ${entry.error.issues.map((i) => i.message).join(', ')}`);
      invalid.push(index);
    }
  });

  return { file: parsed.data, entries, invalid };
}

export function loadEntryFile(filePath: string): LoadedEntries {
  if (!fs.existsSync(filePath)) {
    throw new EntryFileError(filePath, 'file not found');
  }
  return parseEntryFile(fs.readFileSync(filePath, 'utf-8'), filePath);
}

/** Write processed entries back into their original positions. */
export function serializeEntries(loaded: LoadedEntries): string {
  const list = [...loaded.file.list];
  for (const { index, entry } of loaded.entries) {
    list[index] = entry;
  }
  return JSON.stringify({ ...loaded.file, list }, null, 4);
}

export function saveEntryFile(filePath: string, loaded: LoadedEntries): void {
  fs.writeFileSync(filePath, serializeEntries(loaded), 'utf-8');
}
