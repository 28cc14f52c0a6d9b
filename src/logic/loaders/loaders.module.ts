import { Module } from '@nestjs/common';
import { DocumentLoader } from './document-loader';
import { PdfLoader } from './pdf.loader';
import { SourceDocumentLoader } from './source-document.loader';
import { WebLoader } from './web.loader';

@Module({
    providers: [
        PdfLoader,
        WebLoader,
        SourceDocumentLoader,
        { provide: DocumentLoader, useExisting: SourceDocumentLoader },
    ],
    exports: [DocumentLoader],
})
export class LoadersModule {}
