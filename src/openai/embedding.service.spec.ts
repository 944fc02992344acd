import OpenAI from 'openai';
import { AppConfigService } from '../config/app-config.service.js';
import { BadRequestError, InternalError } from '../common/errors/api-errors.js';
import { EMBEDDING_DIMENSIONS } from '../db/types/index.js';
import { EmbeddingService, embeddingInput } from './embedding.service.js';
import { OpenAiClientService } from './openai-client.service.js';

function embeddingResponse(embedding: number[]) {
  return {
    object: 'list' as const,
    model: 'text-embedding-3-small',
    data: [{ object: 'embedding' as const, index: 0, embedding }],
    usage: { prompt_tokens: 3, total_tokens: 3 },
  };
}

describe('embeddingInput', () => {
  it('joins non-blank title and content', () => {
    expect(embeddingInput(' Cats ', 'They purr.')).toBe('Cats\n\nThey purr.');
    expect(embeddingInput(null, 'Only content')).toBe('Only content');
    expect(embeddingInput('  ', undefined)).toBe('');
  });
});

describe('EmbeddingService', () => {
  let config: AppConfigService;
  let openai: OpenAiClientService;
  let service: EmbeddingService;
  let client: OpenAI;
  let create: jest.SpyInstance;

  beforeEach(() => {
    config = new AppConfigService();
    config.update({ openaiApiKey: 'test-key', embeddingModel: 'text-embedding-3-small' });
    openai = new OpenAiClientService(config);
    client = new OpenAI({ apiKey: 'test-key' });
    jest.spyOn(openai, 'getClient').mockReturnValue(client);
    create = jest.spyOn(client.embeddings, 'create');
    service = new EmbeddingService(openai, config);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('requires an API key', async () => {
    config.update({ openaiApiKey: '' });
    jest.spyOn(openai, 'getClient').mockReturnValue(null);

    await expect(service.embed('cats')).rejects.toThrow(
      new BadRequestError('Semantic search requires OPENAI_API_KEY'),
    );
  });

  it('returns the vector from the embeddings API', async () => {
    const vector = new Array<number>(EMBEDDING_DIMENSIONS).fill(0.01);
    create.mockResolvedValue(embeddingResponse(vector));

    await expect(service.embed('cats')).resolves.toEqual(vector);
    expect(create).toHaveBeenCalledWith({ model: 'text-embedding-3-small', input: 'cats' });
  });

  it('rejects a vector of the wrong size', async () => {
    create.mockResolvedValue(embeddingResponse([0.1, 0.2]));
    await expect(service.embed('cats')).rejects.toBeInstanceOf(InternalError);
  });

  it('wraps API failures as InternalError', async () => {
    create.mockRejectedValue(new Error('boom'));
    await expect(service.embed('cats')).rejects.toThrow('Embedding request failed');
  });

  describe('embedKnowledge', () => {
    it('returns null when OpenAI is off', async () => {
      config.update({ openaiApiKey: '' });
      await expect(service.embedKnowledge('t', 'c')).resolves.toBeNull();
      expect(create).not.toHaveBeenCalled();
    });

    it('returns null for rows without text', async () => {
      await expect(service.embedKnowledge(null, '   ')).resolves.toBeNull();
      expect(create).not.toHaveBeenCalled();
    });

    it('returns null when the call fails', async () => {
      create.mockRejectedValue(new Error('timeout'));
      await expect(service.embedKnowledge('Cats', 'They purr.')).resolves.toBeNull();
    });

    it('embeds title and content together', async () => {
      const vector = new Array<number>(EMBEDDING_DIMENSIONS).fill(0.5);
      create.mockResolvedValue(embeddingResponse(vector));

      await expect(service.embedKnowledge('Cats', 'They purr.')).resolves.toEqual(vector);
      expect(create).toHaveBeenCalledWith({
        model: 'text-embedding-3-small',
        input: 'Cats\n\nThey purr.',
      });
    });
  });
});
