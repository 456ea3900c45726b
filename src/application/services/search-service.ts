import type { FileSystemPort } from '../ports/file-system.port';
import type { MetadataResolver } from './metadata-resolver';
import type { TreeWalker, WalkOptions } from './tree-walker';
import { extensionOf } from '../../domain/file-category';
import type { FileDescriptor } from '../../domain/file-descriptor';
import { SEARCH_MODE, TEXT_CONTENT_EXTENSIONS, searchCriteriaSchema } from '../../domain/search-criteria';
import type { SearchCriteria, SearchCriteriaInput } from '../../domain/search-criteria';
import { DIGEST_CHUNK_SIZE, MS_PER_DAY } from '../../config/constants';
import { getLogger } from '../../utils/get-logger';

export type SearchOptions = WalkOptions & {
  now?: Date;
};

export class SearchService {
  private readonly logger = getLogger('search-service');

  public constructor(
    private readonly fileSystem: FileSystemPort,
    private readonly walker: TreeWalker,
    private readonly resolver: MetadataResolver,
  ) { }

  /**
   * Files and directories below root matching the criteria, in traversal order.
   */
  public async search(
    root: string,
    input: SearchCriteriaInput,
    options: SearchOptions = {},
  ): Promise<FileDescriptor[]> {
    const criteria = searchCriteriaSchema.parse(input);
    const now = (options.now ?? new Date()).getTime();
    const keyword = normalizeKeyword(criteria);
    const results: FileDescriptor[] = [];

    for await (const entryPath of this.walker.walk(root, options)) {
      const descriptor = await this.resolver.resolve(entryPath);
      if (!descriptor) {
        continue;
      }
      if (!matchesName(descriptor, criteria, keyword)) {
        continue;
      }
      if (!matchesSize(descriptor, criteria) || !matchesAge(descriptor, criteria, now)) {
        continue;
      }
      if (criteria.searchMode === SEARCH_MODE.CONTENT && !(await this.matchesContent(descriptor, criteria, keyword))) {
        continue;
      }
      results.push(descriptor);
      options.progress?.addProcessed(descriptor.name, descriptor.sizeBytes, 'matched');
    }

    this.logger.info(
      `Search finished: root=${root}, mode=${criteria.searchMode}, keyword=${criteria.keyword}, results=${results.length}`,
    );
    return results;
  }

  private async matchesContent(
    descriptor: FileDescriptor,
    criteria: SearchCriteria,
    keyword: string,
  ): Promise<boolean> {
    if (descriptor.isDirectory || !TEXT_CONTENT_EXTENSIONS.has(extensionOf(descriptor.name))) {
      return false;
    }
    if (keyword.length === 0) {
      return true;
    }

    const overlap = keyword.length - 1;
    let carry = '';
    try {
      const stream = this.fileSystem.openReadStream(descriptor.path, DIGEST_CHUNK_SIZE);
      stream.setEncoding('utf8');
      for await (const chunk of stream) {
        const text = carry + (criteria.caseSensitive ? String(chunk) : String(chunk).toLowerCase());
        if (text.includes(keyword)) {
          stream.destroy();
          return true;
        }
        carry = overlap > 0 ? text.slice(-overlap) : '';
      }
      return false;
    } catch (error) {
      this.logger.debug(
        `Content search skipped: path=${descriptor.path}, error=${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }
}

const normalizeKeyword = (criteria: SearchCriteria): string => {
  const keyword = criteria.caseSensitive ? criteria.keyword : criteria.keyword.toLowerCase();
  if (criteria.searchMode === SEARCH_MODE.EXTENSION && keyword.length > 0 && !keyword.startsWith('.')) {
    return `.${keyword}`;
  }
  return keyword;
};

const matchesName = (descriptor: FileDescriptor, criteria: SearchCriteria, keyword: string): boolean => {
  const name = criteria.caseSensitive ? descriptor.name : descriptor.name.toLowerCase();
  switch (criteria.searchMode) {
    case SEARCH_MODE.NAME:
      return name.includes(keyword);
    case SEARCH_MODE.EXTENSION:
      return extensionOfName(name) === keyword;
    case SEARCH_MODE.CONTENT:
      return true;
  }
};

// extensionOf lower-cases, which must not happen for case-sensitive matching
const extensionOfName = (name: string): string => {
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot) : '';
};

const matchesSize = (descriptor: FileDescriptor, criteria: SearchCriteria): boolean => {
  if (descriptor.isDirectory) {
    return true;
  }
  if (criteria.minSizeBytes > 0 && descriptor.sizeBytes < criteria.minSizeBytes) {
    return false;
  }
  if (criteria.maxSizeBytes > 0 && descriptor.sizeBytes > criteria.maxSizeBytes) {
    return false;
  }
  return true;
};

const matchesAge = (descriptor: FileDescriptor, criteria: SearchCriteria, now: number): boolean => {
  if (descriptor.isDirectory || criteria.minAgeDays <= 0) {
    return true;
  }
  const ageDays = (now - descriptor.modifiedAt.getTime()) / MS_PER_DAY;
  return ageDays >= criteria.minAgeDays;
};
