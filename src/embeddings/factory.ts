import type { EmbeddingsConfig } from '../config/schema.js';
import { JinaTextEmbedder } from './jina.js';
import { MockTextEmbedder } from './mock.js';
import { OllamaTextEmbedder } from './ollama.js';
import { OpenAITextEmbedder } from './openai.js';
import type { TextEmbedder } from './types.js';

// Создание TextEmbedder по секции embeddings конфигурации.
export function createTextEmbedder(config: EmbeddingsConfig): TextEmbedder {
  switch (config.provider) {
  case 'jina':
    if (!config.jina) {
      throw new Error('Jina embeddings config is required when provider is "jina"');
    }
    return new JinaTextEmbedder(config.jina);
  case 'openai':
    if (!config.openai) {
      throw new Error('OpenAI embeddings config is required when provider is "openai"');
    }
    return new OpenAITextEmbedder(config.openai);
  case 'ollama':
    return new OllamaTextEmbedder(config.ollama);
  case 'mock':
    return new MockTextEmbedder(config.mock.dimensions);
  }
}
