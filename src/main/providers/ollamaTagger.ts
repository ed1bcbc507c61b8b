import type { TagProvider, WeightedTag } from '../../types/providers';
import { adaptOllamaTagRequest, adaptOllamaTagResponse, postOllamaJson, type OllamaConnection } from './ollama';

export interface OllamaTagProviderOptions extends OllamaConnection {
  model: string;
  /** Content beyond this many characters is cut before prompting */
  maxPromptChars: number;
}

export const truncateForPrompt = (content: string, maxChars: number) => {
  if (content.length <= maxChars) {
    return content;
  }
  return `${content.slice(0, maxChars)}\n[… truncated ${content.length - maxChars} characters]`;
};

export class OllamaTagProvider implements TagProvider {
  readonly name: string;
  private readonly options: OllamaTagProviderOptions;

  constructor(options: OllamaTagProviderOptions) {
    this.options = options;
    this.name = `ollama:${options.model}`;
  }

  async tag(filePath: string, content: string, signal?: AbortSignal): Promise<WeightedTag[]> {
    const request = adaptOllamaTagRequest(
      this.options.model,
      filePath,
      truncateForPrompt(content, this.options.maxPromptChars),
    );
    const payload = await postOllamaJson(this.options, '/api/generate', request, this.name, signal);
    return adaptOllamaTagResponse(payload, this.name);
  }
}
