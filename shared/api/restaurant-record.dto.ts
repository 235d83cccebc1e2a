// shared/api/restaurant-record.dto.ts
// Restaurant shape returned by the search provider and echoed back to clients.
// Optional fields are omitted when the provider does not know them.

export interface RestaurantRecordDTO {
    id: string;
    name: string;
    cuisine?: string;
    location?: string;
    rating?: number;
    priceRange?: string;
    description?: string;
}
