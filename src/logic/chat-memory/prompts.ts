import { clipText } from '../../utils/textNormalizer';

export const REWRITE_SYSTEM = `
You rewrite follow-up questions into fully self-contained questions for a document search.
Resolve pronouns and elliptical references (it/this/they/"and for X?") from the recent turns.
Keep the user's intent and constraints. Do not answer the question and do not add facts.
If the message is already self-contained, return it unchanged.
Output ONLY the rewritten question, nothing else.
`;

export function buildRewriteUser(
    history: { userUtterance: string; answerText: string }[],
    userInput: string
) {
    const hist = history
        .map(turn => `USER: ${turn.userUtterance}\nASSISTANT: ${clipText(turn.answerText, 2000)}`)
        .join('\n');
    return `
RECENT TURNS:
${hist}
----
FOLLOW-UP FROM USER:
${userInput}
----
Rewrite the follow-up into a single explicit question.
`;
}
