/** Scores each passage's relevance to the query; one score per passage, same order. */
export abstract class RerankModel {
    abstract score(query: string, passages: string[], signal?: AbortSignal): Promise<number[]>;
}
