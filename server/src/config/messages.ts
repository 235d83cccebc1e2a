/**
 * User-facing reply text. Kept in one place so the transport and the
 * service agree on what each failure reads like.
 */

export const HELP_MESSAGE = [
    "I can help you find restaurants and keep track of the ones you like.",
    "Try things like:",
    "- \"best Italian restaurants in Delhi\"",
    "- \"what about something cheaper?\"",
    "- \"create a collection called Weekend Dinners\""
].join('\n');

export const EMPTY_INPUT_MESSAGE = "I didn't catch that. " + HELP_MESSAGE;

export const NO_RESULTS_FOR_COLLECTION_MESSAGE =
    "I don't have any restaurants from this conversation to save yet. Search for some first, then ask me to make a collection.";

export const SEARCH_FAILED_MESSAGE =
    "Sorry, I couldn't reach the restaurant service just now. Please try again in a moment.";

export const COLLECTION_FAILED_MESSAGE =
    "Sorry, I ran into a problem creating the collection. Please try again.";

export const AUTH_REQUIRED_MESSAGE =
    "You need to be signed in to create a collection. Please sign in and try again.";

export const MODEL_UNAVAILABLE_MESSAGE =
    "I'm having trouble answering right now. Please try again in a moment.";

export const CANCELLED_MESSAGE = "The request was cancelled before it finished.";

export const COLLECTION_OFFER = "Would you like me to save these to a collection?";

export function collectionCreatedMessage(name: string, count: number): string {
    const noun = count === 1 ? 'restaurant' : 'restaurants';
    return `✅ Collection '${name}' created with ${count} ${noun}.`;
}
