import type { BulkItem } from './actions';

export class BulkIndexError extends Error {
  readonly errors: BulkItem[];

  constructor(message: string, errors: BulkItem[]) {
    super(message);
    this.name = 'BulkIndexError';
    this.errors = errors;
  }
}

export class ScanError extends Error {
  readonly scrollId: string;

  constructor(scrollId: string, message: string) {
    super(message);
    this.name = 'ScanError';
    this.scrollId = scrollId;
  }
}
