export type ResourceKind = 'document' | 'docs-list' | 'stopwords';

/**
 * A file the indexing pipeline depends on cannot be located.
 * This error should not trigger retries - the build is aborted.
 */
export class ResourceNotFoundError extends Error {
  constructor(
    readonly kind: ResourceKind,
    readonly resource: string,
  ) {
    super(`${kindLabel(kind)} ${resource} not found`);
    this.name = 'ResourceNotFoundError';
    Object.setPrototypeOf(this, ResourceNotFoundError.prototype);
  }
}

function kindLabel(kind: ResourceKind): string {
  switch (kind) {
    case 'document':
      return 'Document';
    case 'docs-list':
      return 'Document list';
    case 'stopwords':
      return 'Stop-word file';
  }
}
