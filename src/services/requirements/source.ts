// =============================================================================
// PATHGUARD — Document Sources
//
// The corpus is whatever a DocumentSource lists. Paths are relative to the
// source root, '/'-separated, so the same document derives the same
// requirement on every platform.
// =============================================================================

import { promises as fs } from 'fs';
import path from 'path';

export const DOCUMENT_EXTENSIONS: readonly string[] = ['.txt', '.pdf', '.md'];

export interface DocumentSource {
  /** Relative document paths, sorted */
  listDocuments(): Promise<string[]>;
}

/** Documents under a directory tree, filtered by extension */
export class FileSystemDocumentSource implements DocumentSource {
  constructor(
    private readonly root: string,
    private readonly extensions: readonly string[] = DOCUMENT_EXTENSIONS
  ) {}

  async listDocuments(): Promise<string[]> {
    const found: string[] = [];
    await this.walk(this.root, [], found);
    return found.sort();
  }

  private async walk(dir: string, prefix: string[], found: string[]): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.isDirectory()) {
        await this.walk(path.join(dir, entry.name), [...prefix, entry.name], found);
      } else if (
        entry.isFile() &&
        this.extensions.includes(path.extname(entry.name).toLowerCase())
      ) {
        found.push([...prefix, entry.name].join('/'));
      }
    }
  }
}

/** Fixed list of paths, for callers that already know the corpus */
export class StaticDocumentSource implements DocumentSource {
  constructor(private readonly paths: readonly string[]) {}

  async listDocuments(): Promise<string[]> {
    return [...new Set(this.paths)].sort();
  }
}
