import type { ContextPayload } from '../context/context.types.js';

/**
 * Language model collaborator. Non-deterministic; may fail or hang.
 * Implementations throw ModelUnavailable on failure.
 */
export interface ChatModel {
    complete(prompt: string, context: ContextPayload, signal?: AbortSignal): Promise<string>;
}
