import OpenAI from 'openai';

/**
 * Build the SDK client. Kept separate from the provider so tests never
 * construct a client and the key is read from validated config.
 */
export function createOpenAiClient(apiKey: string): OpenAI {
    return new OpenAI({ apiKey, maxRetries: 1 });
}
