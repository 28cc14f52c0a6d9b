import { DocumentSource, LoadedDocument, SourceType } from '../../utils/types';

export type PdfSource = Extract<DocumentSource, { sourceType: SourceType.PDF }>;
export type WebSource = Extract<DocumentSource, { sourceType: SourceType.WEB }>;

/** Turns a submitted source into located text sections, ready for chunking. */
export abstract class DocumentLoader {
    abstract load(source: DocumentSource, signal?: AbortSignal): Promise<LoadedDocument>;
}
