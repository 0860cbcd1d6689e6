import type { Logger } from "pino";
import type { LLMProvider } from "./types.js";
import type { AppConfig } from "../config/env.js";
import { OpenAiProvider } from "./openai.provider.js";
import { createOpenAiClient } from "../services/openai.client.js";

/**
 * Returns null when enrichment is disabled or not configured;
 * callers then take their deterministic paths.
 */
export function createLLMProvider(config: AppConfig, logger: Logger): LLMProvider | null {
    switch (config.llmProvider) {
        case "openai": {
            if (!config.openaiApiKey) return null;
            return new OpenAiProvider({
                client: createOpenAiClient(config.openaiApiKey),
                model: config.openaiModel,
                timeoutMs: config.llmTimeoutMs,
                logger
            });
        }
        case "none":
        case "disabled":
            return null;
        default:
            logger.warn({ provider: config.llmProvider }, "[llm] Unknown LLM_PROVIDER, enrichment disabled");
            return null;
    }
}
