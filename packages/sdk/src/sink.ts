/**
 * Persists extracted responses to disk, named by content checksum.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { responseContent, type ExtractedResponse } from './extractor.js';

export interface FileSinkOptions {
  /** Target directory, created when missing. Default: cwd */
  dir?: string;
  /** File name prefix. Default: "response" */
  prefix?: string;
}

export interface SavedResponse {
  path: string;
  bytes: number;
  md5: string;
}

export class FileResponseSink {
  private readonly dir: string;
  private readonly prefix: string;

  constructor(options: FileSinkOptions = {}) {
    this.dir = options.dir ?? process.cwd();
    this.prefix = options.prefix ?? 'response';
  }

  pathFor(response: Pick<ExtractedResponse, 'md5'>): string {
    return join(this.dir, `${this.prefix}_${response.md5}.bin`);
  }

  /**
   * Write the response content. Empty content still produces a file.
   */
  async save(response: ExtractedResponse): Promise<SavedResponse> {
    const content = responseContent(response);
    await mkdir(this.dir, { recursive: true });
    const path = this.pathFor(response);
    await writeFile(path, content);
    return { path, bytes: content.length, md5: response.md5 };
  }
}
