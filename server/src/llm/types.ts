export type Message = {
    role: "system" | "user" | "assistant";
    content: string;
};

export interface CompletionOptions {
    model?: string;
    temperature?: number;
    timeout?: number;
}

export interface LLMProvider {
    readonly name: string;

    /** Free-form completion; callers extract and validate any embedded JSON themselves. */
    complete(messages: Message[], opts?: CompletionOptions): Promise<string>;
}
