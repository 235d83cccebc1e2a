import OpenAI from "openai";
import type { z } from "zod";
import { logger } from "../lib/logger/structured-logger.js";
import { withTimeout } from "../lib/reliability/timeout-guard.js";
import { extractJsonLoose } from "./json-extract.js";
import type { CompletionOptions, LLMProvider, Message } from "./types.js";

export interface OpenAiProviderConfig {
    apiKey: string;
    model: string;
    temperature: number;
    timeoutMs: number;
}

export class OpenAiProvider implements LLMProvider {
    private readonly client: OpenAI;

    constructor(private readonly config: OpenAiProviderConfig, client?: OpenAI) {
        this.client = client ?? new OpenAI({ apiKey: config.apiKey });
    }

    async completeJSON<T extends z.ZodTypeAny>(
        messages: Message[],
        schema: T,
        opts?: CompletionOptions
    ): Promise<z.infer<T>> {
        const raw = await this.request(messages, { temperature: 0, ...opts }, true);
        const strict = schema.safeParse(extractJsonLoose(raw));
        if (!strict.success) {
            logger.warn({ issues: strict.error.issues.length }, '[LLM] JSON completion failed schema validation');
            throw strict.error;
        }
        return strict.data;
    }

    async complete(messages: Message[], opts?: CompletionOptions): Promise<string> {
        return this.request(messages, opts ?? {}, false);
    }

    private async request(messages: Message[], opts: CompletionOptions, json: boolean): Promise<string> {
        const model = opts.model ?? this.config.model;
        const timeoutMs = opts.timeout ?? this.config.timeoutMs;
        const controller = new AbortController();
        const tStart = Date.now();

        try {
            const resp = await withTimeout(
                this.client.chat.completions.create(
                    {
                        model,
                        messages,
                        temperature: opts.temperature ?? this.config.temperature,
                        ...(json ? { response_format: { type: "json_object" as const } } : {})
                    },
                    { signal: controller.signal }
                ),
                timeoutMs,
                'llm.complete',
                () => controller.abort(),
                opts.signal
            );
            const text = resp.choices[0]?.message?.content ?? '';
            logger.debug({ model, json, durationMs: Date.now() - tStart }, '[LLM] completion ok');
            return text;
        } catch (err) {
            controller.abort();
            logger.warn({
                model,
                json,
                durationMs: Date.now() - tStart,
                error: err instanceof Error ? err.name : String(err)
            }, '[LLM] completion failed');
            throw err;
        }
    }
}
