import * as path from 'path';
import { readFile } from 'fs/promises';
import { CATEGORY_FILES } from './validators';
import type { Category } from './validators';

/**
 * Where category documents come from. `read` resolves with the parsed
 * document and rejects when the category is missing or unreadable.
 */
export interface RecordSource {
  readonly description: string;
  read(category: Category, signal: AbortSignal): Promise<unknown>;
}

/**
 * One JSON file per category under a data directory.
 */
export class JsonDirectorySource implements RecordSource {
  readonly description: string;

  constructor(private readonly dataDir: string) {
    this.description = `data directory ${dataDir}`;
  }

  async read(category: Category, signal: AbortSignal): Promise<unknown> {
    const filePath = path.join(this.dataDir, CATEGORY_FILES[category]);
    const text = await readFile(filePath, { encoding: 'utf8', signal });
    const document: unknown = JSON.parse(text);
    return document;
  }
}
