import type { ConversationIntentDTO } from '../../../../shared/api/index.js';

/**
 * Classified purpose of an incoming turn.
 * Never persisted; computed per turn from a thread snapshot.
 */
export type Intent = ConversationIntentDTO;

export type IntentRuleName =
    | 'collection_with_results'
    | 'collection_without_results'
    | 'explicit_search'
    | 'follow_up'
    | 'help_or_greeting'
    | 'fallback';

export interface IntentDecision {
    intent: Intent;
    rule: IntentRuleName;
}
