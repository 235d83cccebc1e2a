import type { ConversationErrorKindDTO } from '../../../../shared/api/index.js';
import { COLLECTION_FAILED_MESSAGE, SEARCH_FAILED_MESSAGE } from '../../config/messages.js';

export type ConversationErrorKind = ConversationErrorKindDTO;

export interface SurfacedError {
    kind: ConversationErrorKind;
    message: string;
}

/**
 * Base for every error a turn can surface. `message` is written for the
 * end user; `kind` is what the transport branches on.
 */
export abstract class ConversationError extends Error {
    abstract readonly kind: ConversationErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }

    toJSON(): SurfacedError {
        return { kind: this.kind, message: this.message };
    }
}

/** Empty or unusable input; answered locally with a help prompt */
export class InputError extends ConversationError {
    readonly kind = 'InputError' as const;
}

/** CollectionCreate with no cached results to attach */
export class UnsatisfiableIntent extends ConversationError {
    readonly kind = 'UnsatisfiableIntent' as const;
}

export interface ProviderErrorOptions {
    statusCode?: number;
    /** False once the backend may have applied the request */
    retriable?: boolean;
    /** Diagnostic text for logs, never shown to the user */
    detail?: string;
    cause?: unknown;
}

/** Search or collection backend failure */
export class ProviderError extends ConversationError {
    readonly kind = 'ProviderError' as const;
    readonly statusCode: number | undefined;
    readonly retriable: boolean;
    readonly detail: string | undefined;

    constructor(
        public readonly provider: 'search' | 'collections',
        options: ProviderErrorOptions = {}
    ) {
        super(
            provider === 'search' ? SEARCH_FAILED_MESSAGE : COLLECTION_FAILED_MESSAGE,
            options.cause !== undefined ? { cause: options.cause } : undefined
        );
        this.statusCode = options.statusCode;
        this.retriable = options.retriable ?? true;
        this.detail = options.detail;
    }
}

/** Missing or rejected token for collection creation; never retried */
export class AuthError extends ConversationError {
    readonly kind = 'AuthError' as const;
}

/** Language model failed, timed out or was cancelled */
export class ModelUnavailable extends ConversationError {
    readonly kind = 'ModelUnavailable' as const;
}

export function isConversationError(err: unknown): err is ConversationError {
    return err instanceof ConversationError;
}
