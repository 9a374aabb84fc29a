import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs/promises';
import * as path from 'path';
import { SearchConfig } from '../../config/search.config';
import {
  ResourceKind,
  ResourceNotFoundError,
} from '../../indexing/errors/resource-not-found.error';

/**
 * Reads documents, document lists and stop-word files from the corpus directory.
 */
@Injectable()
export class CorpusReaderService {
  private readonly logger = new Logger(CorpusReaderService.name);
  private readonly root: string;

  constructor(configService: ConfigService) {
    this.root = path.resolve(configService.getOrThrow<SearchConfig>('search').corpusRoot);
  }

  getRoot(): string {
    return this.root;
  }

  /**
   * Read a corpus file as UTF-8 text.
   * Names resolving outside the corpus directory are treated as missing.
   */
  async read(name: string, kind: ResourceKind): Promise<string> {
    const filePath = this.resolve(name);
    if (!filePath) {
      this.logger.warn(`Rejected ${kind} path outside corpus: ${name}`);
      throw new ResourceNotFoundError(kind, name);
    }

    try {
      return await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new ResourceNotFoundError(kind, name);
      }
      throw error;
    }
  }

  private resolve(name: string): string | null {
    if (!name) {
      return null;
    }
    const filePath = path.resolve(this.root, name);
    const relative = path.relative(this.root, filePath);
    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
      return null;
    }
    return filePath;
  }
}

function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'EISDIR' || error.code === 'ENOTDIR')
  );
}
