import type { z } from "zod";

export type Message = {
    role: "system" | "user" | "assistant";
    content: string;
};

export interface CompletionOptions {
    model?: string;
    temperature?: number;
    timeout?: number;
    signal?: AbortSignal;
}

export interface LLMProvider {
    completeJSON<T extends z.ZodTypeAny>(
        messages: Message[],
        schema: T,
        opts?: CompletionOptions
    ): Promise<z.infer<T>>;

    complete(
        messages: Message[],
        opts?: CompletionOptions
    ): Promise<string>;
}
