export { KnowledgeDocument } from './knowledge-document.entity';
export { ConversationTurn } from './conversation-turn.entity';
