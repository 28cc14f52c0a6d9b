import { GeminiService } from './gemini.service';

const mockEmbedContent = jest.fn();
const mockGenerateContent = jest.fn();

jest.mock('@google/genai', () => ({
  GoogleGenAI: jest.fn().mockImplementation(() => ({
    models: { embedContent: mockEmbedContent, generateContent: mockGenerateContent },
  })),
}));

describe('GeminiService', () => {
  let service: GeminiService;

  beforeEach(() => {
    mockEmbedContent.mockReset();
    mockGenerateContent.mockReset();
    service = new GeminiService({ apiKey: 'test-secret', embedModel: 'embed-test', chatModel: 'chat-test' });
  });

  it('hands the abort signal to the embedding request', async () => {
    mockEmbedContent.mockResolvedValue({ embeddings: [{ values: [0.1, 0.2] }] });
    const controller = new AbortController();

    await expect(service.embedTexts(['refund window'], controller.signal)).resolves.toEqual([[0.1, 0.2]]);
    expect(mockEmbedContent).toHaveBeenCalledWith({
      contents: ['refund window'],
      model: 'embed-test',
      config: { abortSignal: controller.signal },
    });
  });

  it('sends the system text as a preamble and hands over the abort signal', async () => {
    mockGenerateContent.mockResolvedValue({ text: 'Within 30 days.' });
    const controller = new AbortController();

    const answer = await service.complete(
      'Answer briefly.',
      'How long is the refund window?',
      [{ role: 'assistant', content: 'Hello.' }],
      { temperature: 0, signal: controller.signal },
    );

    expect(answer).toBe('Within 30 days.');
    expect(mockGenerateContent).toHaveBeenCalledWith({
      model: 'chat-test',
      config: { temperature: 0, abortSignal: controller.signal },
      contents: [
        { role: 'user', parts: [{ text: 'Answer briefly.\n\n' }] },
        { role: 'model', parts: [{ text: 'Hello.' }] },
        { role: 'user', parts: [{ text: 'How long is the refund window?' }] },
      ],
    });
  });

  it('wraps a failed request', async () => {
    mockEmbedContent.mockRejectedValue(new Error('quota exceeded'));
    await expect(service.embedTexts(['a'])).rejects.toThrow('Failed to generate embeddings: quota exceeded');
  });
});
