import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import {
  CreateIndexDto,
  IndexResponseDto,
  PostingsResponseDto,
} from '../api/dtos/index.dto';
import { IndexingService } from '../indexing/indexing.service';
import { ResourceNotFoundError } from '../indexing/errors/resource-not-found.error';
import { KeywordIndex } from './keyword-index';

interface IndexEntry {
  name: string;
  index: KeywordIndex;
  stopwordCount: number;
  createdAt: Date;
}

/**
 * Holds every built index by name. An index is built once and only read afterwards.
 */
@Injectable()
export class IndexService {
  private readonly logger = new Logger(IndexService.name);
  private readonly indices: Map<string, IndexEntry> = new Map();
  private readonly pending: Set<string> = new Set();

  constructor(private readonly indexing: IndexingService) {}

  async createIndex(createIndexDto: CreateIndexDto): Promise<IndexResponseDto> {
    const { name, documents, docsFile, stopwordsFile } = createIndexDto;
    this.logger.log(`Creating index: ${name}`);

    if ((documents == null) === (docsFile == null)) {
      throw new BadRequestException('Exactly one of documents or docsFile must be provided');
    }
    if (this.indices.has(name) || this.pending.has(name)) {
      throw new ConflictException(`Index ${name} already exists`);
    }

    this.pending.add(name);
    try {
      const built = await this.indexing.buildIndex({ documents, docsFile, stopwordsFile });
      const entry: IndexEntry = {
        name,
        index: built.index,
        stopwordCount: built.stopwordCount,
        createdAt: new Date(),
      };
      this.indices.set(name, entry);
      this.logger.log(`Index ${name} created with ${built.index.documentCount} documents`);
      return this.toResponse(entry);
    } catch (error) {
      if (error instanceof ResourceNotFoundError) {
        this.logger.warn(`Index ${name} not created: ${error.message}`);
        throw new NotFoundException(error.message);
      }
      this.logger.error(`Error creating index ${name}: ${String(error)}`);
      throw error;
    } finally {
      this.pending.delete(name);
    }
  }

  listIndices(): IndexResponseDto[] {
    this.logger.log('Listing all indices');
    return Array.from(this.indices.values()).map(entry => this.toResponse(entry));
  }

  getIndex(name: string): IndexResponseDto {
    return this.toResponse(this.requireEntry(name));
  }

  /**
   * The built index behind a name, for read-only use
   */
  requireIndex(name: string): KeywordIndex {
    return this.requireEntry(name).index;
  }

  getPostings(name: string, keyword: string): PostingsResponseDto {
    const normalized = keyword.toLowerCase();
    const list = this.requireIndex(name).getPostingList(normalized);
    if (!list) {
      throw new NotFoundException(`Keyword ${normalized} not found in index ${name}`);
    }

    return {
      keyword: normalized,
      postings: list.map(({ document, frequency }) => ({ document, frequency })),
    };
  }

  deleteIndex(name: string): void {
    this.logger.log(`Deleting index: ${name}`);
    if (!this.indices.delete(name)) {
      throw new NotFoundException(`Index with name ${name} not found`);
    }
    this.logger.log(`Successfully deleted index ${name}`);
  }

  get indexCount(): number {
    return this.indices.size;
  }

  private requireEntry(name: string): IndexEntry {
    const entry = this.indices.get(name);
    if (!entry) {
      throw new NotFoundException(`Index with name ${name} not found`);
    }
    return entry;
  }

  private toResponse(entry: IndexEntry): IndexResponseDto {
    return {
      name: entry.name,
      documentCount: entry.index.documentCount,
      keywordCount: entry.index.keywordCount,
      stopwordCount: entry.stopwordCount,
      createdAt: entry.createdAt.toISOString(),
    };
  }
}
