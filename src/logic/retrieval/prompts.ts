import { clipText } from '../../utils/textNormalizer';

export const RERANK_SYSTEM = `You score how well each passage answers a search query.
Rules:
- Score every passage from 0 (unrelated) to 1 (directly answers the query).
- Judge only the passage text; ignore its position in the list.
- Return ONLY valid JSON, no prose.

Schema:
{ "scores": [ { "index": number, "score": number } ] }`;

export const buildRerankUser = (query: string, passages: string[]) => `QUERY:
${query}

PASSAGES:
${passages.map((passage, index) => `[${index}] ${clipText(passage, 2500)}`).join('\n\n')}`;
