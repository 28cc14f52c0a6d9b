import { Inject, Injectable } from '@nestjs/common';
import { load } from 'cheerio';
import { ragConfig, RagConfig } from '../../config/configuration';
import { normalizeText } from '../../utils/textNormalizer';
import { LoadedDocument } from '../../utils/types';
import { WebSource } from './document-loader';

const NON_CONTENT = 'script, style, noscript, template, iframe, svg, nav, header, footer, aside, form';
const BLOCKS = 'p, div, section, article, main, li, tr, h1, h2, h3, h4, h5, h6, pre, blockquote, br';

/** Visible text of an HTML page, one line per block element. */
export function extractReadableText(html: string): { title?: string; text: string } {
    const $ = load(html);
    const title = $('title').first().text().trim() || undefined;

    $(NON_CONTENT).remove();
    $(BLOCKS).each((_, el) => {
        $(el).append('\n');
    });

    const text = $('body').text()
        .split('\n')
        .map(line => line.replace(/\s+/g, ' ').trim())
        .filter(line => line.length > 0)
        .join('\n');

    return { title, text };
}

@Injectable()
export class WebLoader {
    constructor(@Inject(ragConfig.KEY) private readonly config: RagConfig) { }

    /** The whole page is one section located at its URL. */
    async load(source: WebSource, signal?: AbortSignal): Promise<LoadedDocument> {
        const timeout = AbortSignal.timeout(this.config.webFetchTimeoutMs);
        const resp = await fetch(source.url, {
            headers: { Accept: 'text/html,application/xhtml+xml,text/plain;q=0.9' },
            redirect: 'follow',
            signal: signal ? AbortSignal.any([signal, timeout]) : timeout
        });
        if (!resp.ok) {
            throw new Error(`Fetching ${source.url} failed with status ${resp.status}`);
        }

        const body = await resp.text();
        const contentType = resp.headers.get('content-type') ?? '';
        const page = contentType.includes('text/plain')
            ? { title: undefined, text: normalizeText(body) }
            : extractReadableText(body);

        return {
            title: page.title,
            sections: page.text ? [{ text: page.text, location: source.url }] : []
        };
    }
}
