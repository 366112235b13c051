/**
 * JSON-lines file
 *
 * Append-only text file holding one JSON document per line. Shared by the
 * audit log and the role log.
 */

import { mkdir, open, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';

export interface JsonLine {
  text: string;
  /** 1-based position in the file */
  lineNumber: number;
}

export class JsonlFile {
  private directoryReady = false;

  constructor(readonly path: string) {}

  /**
   * Append one line. When the write fails the file is truncated back to its
   * previous length, so a torn line never survives.
   */
  async append(line: string): Promise<void> {
    if (!this.directoryReady) {
      await mkdir(dirname(this.path), { recursive: true });
      this.directoryReady = true;
    }

    const handle = await open(this.path, 'a');
    try {
      const { size } = await handle.stat();
      try {
        await handle.appendFile(`${line}\n`, 'utf8');
      } catch (error) {
        await handle.truncate(size);
        throw error;
      }
    } finally {
      await handle.close();
    }
  }

  /**
   * Non-blank lines in file order; empty when the file does not exist yet
   */
  async readLines(): Promise<JsonLine[]> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return [];
      }
      throw error;
    }

    const lines: JsonLine[] = [];
    content.split('\n').forEach((text, index) => {
      if (text.trim()) {
        lines.push({ text, lineNumber: index + 1 });
      }
    });
    return lines;
  }
}

function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
