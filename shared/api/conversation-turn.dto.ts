import type { RestaurantRecordDTO } from "./restaurant-record.dto.js";

export type ConversationIntentDTO = "Search" | "CollectionCreate" | "FollowUp" | "Help" | "Unknown";

export type ConversationErrorKindDTO =
    | "InputError"
    | "UnsatisfiableIntent"
    | "ProviderError"
    | "AuthError"
    | "ModelUnavailable";

export interface ConversationTurnRequestDTO {
    text: string;
    threadId?: string;
}

export interface ConversationTurnResponseDTO {
    threadId: string;
    intent: ConversationIntentDTO;
    message: string;
    restaurants: RestaurantRecordDTO[];
    error?: { kind: ConversationErrorKindDTO; message: string };
    collection?: { id: string; name: string; restaurantCount: number };
}

export interface ConversationMessageDTO {
    role: "user" | "assistant";
    text: string;
    createdAt: string; // ISO string
}
