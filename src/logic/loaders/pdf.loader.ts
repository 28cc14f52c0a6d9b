import { Injectable } from '@nestjs/common';
import { PDFParse } from 'pdf-parse';
import { normalizeText } from '../../utils/textNormalizer';
import { LoadedDocument } from '../../utils/types';
import { PdfSource } from './document-loader';

@Injectable()
export class PdfLoader {
    /** One section per page that has text; location is the 1-indexed page number. */
    async load(source: PdfSource): Promise<LoadedDocument> {
        const parser = new PDFParse({ data: source.data });
        try {
            const result = await parser.getText();
            const sections = result.pages
                .map(page => ({ text: normalizeText(page.text), location: page.num }))
                .filter(section => section.text.length > 0);
            return { title: source.displayName.replace(/\.pdf$/i, ''), sections };
        } finally {
            await parser.destroy();
        }
    }
}
