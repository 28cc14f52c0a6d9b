import { Test, TestingModule } from '@nestjs/testing';
import { ragConfig } from '../../config/configuration';
import { never, ScriptedRerankModel, testRagConfig } from '../../testing/fakes';
import { RerankModel } from './rerank.model';
import { RerankerService } from './reranker.service';

const candidates = ['a', 'b', 'c', 'd', 'e', 'f'].map(id => ({ id, text: `passage ${id}` }));

describe('RerankerService', () => {
  let service: RerankerService;
  let scorer: (query: string, passages: string[]) => Promise<number[]> | number[];

  beforeEach(async () => {
    scorer = () => [];
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RerankerService,
        { provide: ragConfig.KEY, useValue: testRagConfig({ rerankTopN: 4, rerankTimeoutMs: 20 }) },
        { provide: RerankModel, useValue: new ScriptedRerankModel((query, passages) => scorer(query, passages)) },
      ],
    }).compile();

    service = module.get<RerankerService>(RerankerService);
  });

  it('keeps the n best by score, ties in retrieval order', async () => {
    scorer = () => [0.1, 0.8, 0.5, 0.8, 0.9, 0.2];
    const outcome = await service.rerank('q', candidates);
    expect(outcome).toEqual({ degraded: false, chunks: [candidates[4], candidates[1], candidates[3], candidates[2]] });
  });

  it('honours an explicit n', async () => {
    scorer = () => [0.1, 0.8, 0.5, 0.8, 0.9, 0.2];
    const outcome = await service.rerank('q', candidates, 1);
    expect(outcome.chunks.map(chunk => chunk.id)).toEqual(['e']);
  });

  it('falls back to the first n when scoring fails', async () => {
    scorer = () => Promise.reject(new Error('rerank 503'));
    const outcome = await service.rerank('q', candidates);
    expect(outcome).toEqual({ degraded: true, chunks: candidates.slice(0, 4) });
  });

  it('falls back to the first n when scoring times out', async () => {
    scorer = () => never<number[]>();
    const outcome = await service.rerank('q', candidates);
    expect(outcome.degraded).toBe(true);
    expect(outcome.chunks.map(chunk => chunk.id)).toEqual(['a', 'b', 'c', 'd']);
  });

  it('falls back when the score count does not match', async () => {
    scorer = () => [1, 0];
    const outcome = await service.rerank('q', candidates);
    expect(outcome.degraded).toBe(true);
  });

  it('returns fewer than n when fewer candidates exist', async () => {
    scorer = () => [0.2, 0.4];
    const outcome = await service.rerank('q', candidates.slice(0, 2));
    expect(outcome.chunks.map(chunk => chunk.id)).toEqual(['b', 'a']);
  });

  it('skips scoring when there is nothing to rank', async () => {
    scorer = () => {
      throw new Error('should not be called');
    };
    await expect(service.rerank('q', [])).resolves.toEqual({ chunks: [], degraded: false });
  });
});
