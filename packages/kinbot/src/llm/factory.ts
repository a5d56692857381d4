import type { ModelConfig } from '../config.js';
import type { GenerativeBackend } from './backend.js';
import { GeminiBackend } from './gemini.js';
import { PiAiBackend } from './piAi.js';

export function createBackend(config: ModelConfig, apiKey: string): GenerativeBackend {
  switch (config.backend) {
    case 'gemini':
      return new GeminiBackend(config, apiKey);
    case 'pi-ai':
      return new PiAiBackend(config, apiKey);
  }
}
