import { z } from 'zod';
import { DocumentMetadataKey } from '../../entities/document.entity';
import { DocumentRef } from './types';

export const secDocumentMetadataSchema = z.object({
  company_name: z.string().min(1),
  company_ticker: z.string().min(1),
  doc_type: z.enum(['10-K', '10-Q']),
  year: z.coerce.number().int(),
  quarter: z.coerce.number().int().min(1).max(4).nullish(),
});

export type SecDocumentMetadata = z.infer<typeof secDocumentMetadataSchema>;

/** null when the document carries no (or malformed) SEC metadata. */
export function readSecMetadata(document: DocumentRef): SecDocumentMetadata | null {
  const raw = document.metadataMap?.[DocumentMetadataKey.SEC_DOCUMENT];
  if (raw === undefined) {
    return null;
  }
  const parsed = secDocumentMetadataSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function timePeriod(metadata: SecDocumentMetadata): string {
  return metadata.quarter ? `${metadata.year} Q${metadata.quarter}` : String(metadata.year);
}

export function buildTitleForDocument(document: DocumentRef): string {
  const sec = readSecMetadata(document);
  if (!sec) {
    return 'No Title Document';
  }
  return `${sec.company_name} (${sec.company_ticker}) ${sec.doc_type} (${timePeriod(sec)})`;
}

export function buildDescriptionForDocument(document: DocumentRef): string {
  const sec = readSecMetadata(document);
  if (!sec) {
    return 'A document containing useful information that the user pre-selected to discuss with the assistant.';
  }
  return `A SEC ${sec.doc_type} filing describing the financials of ${sec.company_name} (${sec.company_ticker}) for the ${timePeriod(sec)} time period.`;
}

export const NO_DOCUMENTS_SELECTED = 'No documents selected.';

/** Bulleted titles of the selected documents, one per line. */
export function buildDocTitles(documents: DocumentRef[]): string {
  if (documents.length === 0) {
    return NO_DOCUMENTS_SELECTED;
  }
  return documents.map(document => `- ${buildTitleForDocument(document)}`).join('\n');
}
