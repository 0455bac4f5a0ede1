import { DocumentMetadataMap } from '../../entities/document.entity';

/** Metadata key carrying the owning document id on every node. */
export const DB_DOC_ID_KEY = 'db_document_id';
export const PAGE_LABEL_KEY = 'page_label';

/** The parts of a Document entity the chat pipeline reads. */
export interface DocumentRef {
  id: string;
  url: string;
  metadataMap: DocumentMetadataMap | null;
}

export interface TextNode {
  id: string;
  text: string;
  metadata: Record<string, string>;
}

export interface NodeWithScore {
  node: TextNode;
  score?: number;
}

export class DocumentFetchError extends Error {
  constructor(readonly url: string, readonly status: number) {
    super(`Failed to fetch document from ${url}: HTTP ${status}`);
    this.name = 'DocumentFetchError';
  }
}
