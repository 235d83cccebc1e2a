export type CollectionId = string;

export interface CollectionDetails {
    name: string;
    description?: string;
    tags?: string[];
}

/**
 * External collection persistence.
 * Throws AuthError when the token is missing or rejected, ProviderError otherwise.
 */
export interface CollectionStore {
    createCollection(
        details: CollectionDetails,
        restaurantIds: readonly string[],
        authToken?: string,
        signal?: AbortSignal
    ): Promise<CollectionId>;
}
