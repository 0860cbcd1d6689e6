import type OpenAI from "openai";
import type { Logger } from "pino";
import type { CompletionOptions, LLMProvider, Message } from "./types.js";
import { LLM_TEMPERATURE } from "../config/index.js";
import { withDeadline } from "../lib/reliability/timeout-guard.js";

function toInput(messages: Message[]) {
    return messages.map(m => ({ role: m.role, content: m.content }));
}

export interface OpenAiProviderOptions {
    client: OpenAI;
    model: string;
    timeoutMs: number;
    logger: Logger;
}

export class OpenAiProvider implements LLMProvider {
    readonly name = "openai";

    constructor(private readonly options: OpenAiProviderOptions) {}

    async complete(messages: Message[], opts?: CompletionOptions): Promise<string> {
        const { client, logger } = this.options;
        const model = opts?.model ?? this.options.model;
        const temperature = opts?.temperature ?? LLM_TEMPERATURE;
        const timeoutMs = opts?.timeout ?? this.options.timeoutMs;
        const tStart = Date.now();

        try {
            const resp = await withDeadline(
                signal => client.responses.create({ model, input: toInput(messages), temperature }, { signal }),
                timeoutMs,
                "OpenAI completion"
            );
            logger.debug({ event: "llm_ok", model, durationMs: Date.now() - tStart }, "[llm] completion ok");
            return resp.output_text || "";
        } catch (e) {
            logger.warn(
                { event: "llm_failed", model, durationMs: Date.now() - tStart, error: e instanceof Error ? e.message : String(e) },
                "[llm] completion failed"
            );
            throw e;
        }
    }
}
