import { clipText } from '../../utils/textNormalizer';
import { RetrievedChunk, SourceType } from '../../utils/types';

export const NO_PERMITTED_INFORMATION_ANSWER =
    "I couldn't find any information you have access to that answers this question.";

export const ANSWER_SYSTEM = `
You answer questions using ONLY the numbered context passages provided.
Rules:
- If the passages do not contain the answer, say you could not find it. Do not guess.
- Be concise and specific; quote figures, dates and conditions exactly as written.
- Refer to passages by their number in square brackets, e.g. [2].
- Do not mention passages, sources or documents that are not in the context.
`;

function sourceLabel(chunk: RetrievedChunk): string {
    return chunk.sourceType === SourceType.PDF
        ? `${chunk.displayName}, page ${chunk.location}`
        : String(chunk.location);
}

export function buildAnswerUser(query: string, chunks: RetrievedChunk[]) {
    const context = chunks
        .map((chunk, i) => `[${i + 1}] (${sourceLabel(chunk)})\n${clipText(chunk.text, 4000)}`)
        .join('\n\n');
    return `
CONTEXT:
${context}
----
QUESTION:
${query}
`;
}
