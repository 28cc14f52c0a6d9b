import { Injectable } from '@nestjs/common';
import { DocumentSource, LoadedDocument, SourceType } from '../../utils/types';
import { DocumentLoader } from './document-loader';
import { PdfLoader } from './pdf.loader';
import { WebLoader } from './web.loader';

@Injectable()
export class SourceDocumentLoader extends DocumentLoader {
    constructor(private readonly pdfLoader: PdfLoader, private readonly webLoader: WebLoader) {
        super();
    }

    load(source: DocumentSource, signal?: AbortSignal): Promise<LoadedDocument> {
        switch (source.sourceType) {
            case SourceType.PDF:
                return this.pdfLoader.load(source);
            case SourceType.WEB:
                return this.webLoader.load(source, signal);
        }
    }
}
