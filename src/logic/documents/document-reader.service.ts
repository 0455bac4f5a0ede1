import { Injectable, Logger } from '@nestjs/common';
import { createWriteStream } from 'node:fs';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import path from 'path';
import { PDFParse } from 'pdf-parse';
import { normalizeText } from '../../utils/textNormalizer';
import { DB_DOC_ID_KEY, DocumentFetchError, DocumentRef, PAGE_LABEL_KEY, TextNode } from './types';

export interface PdfPage {
    num: number;
    text: string;
}

/**
 * Turns a document reference into page nodes: the PDF is streamed to a
 * temporary file, parsed page by page and every page is tagged with the
 * owning document id and its page label.
 */
@Injectable()
export class DocumentReaderService {
    private readonly logger = new Logger(DocumentReaderService.name);

    async fetchAndReadDocument(document: DocumentRef): Promise<TextNode[]> {
        const tempDir = await mkdtemp(path.join(os.tmpdir(), 'filings-chat-'));
        try {
            const filePath = path.join(tempDir, `${document.id}.pdf`);
            const bytes = await this.download(document.url, filePath);
            const pages = await this.readPdfPages(filePath);
            this.logger.debug(`Read ${pages.length} pages (${bytes} bytes) from document ${document.id}`);

            return pages
                .filter(page => page.text.length > 0)
                .map(page => ({
                    id: `${document.id}-page-${page.num}`,
                    text: page.text,
                    metadata: {
                        [DB_DOC_ID_KEY]: document.id,
                        [PAGE_LABEL_KEY]: String(page.num),
                    },
                }));
        } finally {
            await rm(tempDir, { recursive: true, force: true });
        }
    }

    protected async readPdfPages(filePath: string): Promise<PdfPage[]> {
        const parser = new PDFParse({ data: await readFile(filePath) });
        try {
            const result = await parser.getText();
            return result.pages.map(page => ({ num: page.num, text: normalizeText(page.text) }));
        } finally {
            await parser.destroy();
        }
    }

    private async download(url: string, filePath: string): Promise<number> {
        const resp = await fetch(url);
        if (!resp.ok || !resp.body) {
            throw new DocumentFetchError(url, resp.status);
        }

        const file = createWriteStream(filePath);
        await pipeline(Readable.fromWeb(resp.body), file);
        return file.bytesWritten;
    }
}
