import { BaseDocument } from './entities/base-document.entity';

export type DocumentClass<T extends BaseDocument> = new () => T;

/** Everything a caller supplies on insert; id and timestamps are stamped by the store. */
export type DocumentFields<T extends BaseDocument> = Omit<T, keyof BaseDocument>;

export type DocumentFilter = Record<string, string>;

export type PublicDocument<T extends BaseDocument> = Omit<T, '_id'> & {
  id: string;
};

export interface FindDocumentsOptions {
  newestFirst?: boolean;
  limit?: number;
}

/**
 * Thin façade over the document database. Collections are addressed by
 * their entity class; documents are only ever inserted and read.
 */
export abstract class DocumentStore {
  abstract createDocument<T extends BaseDocument>(
    collection: DocumentClass<T>,
    fields: DocumentFields<T>,
  ): Promise<string>;

  abstract getDocuments<T extends BaseDocument>(
    collection: DocumentClass<T>,
    filter: DocumentFilter,
    options?: FindDocumentsOptions,
  ): Promise<T[]>;

  abstract findOne<T extends BaseDocument>(
    collection: DocumentClass<T>,
    filter: DocumentFilter,
  ): Promise<T | null>;

  /** Rejects when `id` is not a valid ObjectId hex string. */
  abstract findById<T extends BaseDocument>(
    collection: DocumentClass<T>,
    id: string,
  ): Promise<T | null>;

  abstract isConnected(): boolean;

  abstract ping(): Promise<void>;

  abstract listCollections(): Promise<string[]>;
}

export function toPublic<T extends BaseDocument>(doc: T): PublicDocument<T> {
  const { _id, ...rest } = doc;
  return { ...rest, id: _id.toHexString() };
}
