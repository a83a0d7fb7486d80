import { Client } from 'langsmith';
import type { InstanceConfig, JsonObject } from '../types/platform.js';

export interface PromptCommit {
  manifest: JsonObject;
}

/** The slice of the LangSmith SDK client used to copy prompts between instances. */
export interface PromptHub {
  pullPromptCommit(promptIdentifier: string, options?: { includeModel?: boolean }): Promise<PromptCommit>;
  pushPrompt(promptIdentifier: string, options?: { object?: unknown }): Promise<string>;
}

export function createPromptHub(config: InstanceConfig): PromptHub {
  const client = new Client({ apiKey: config.apiKey, apiUrl: config.apiUrl });
  return {
    pullPromptCommit: (promptIdentifier, options) => client.pullPromptCommit(promptIdentifier, options),
    pushPrompt: (promptIdentifier, options) => client.pushPrompt(promptIdentifier, options),
  };
}
