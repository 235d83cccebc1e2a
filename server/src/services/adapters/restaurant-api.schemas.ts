import { z } from 'zod';
import type { RestaurantRecordDTO } from '../../../../shared/api/index.js';
import type { RestaurantRecord } from '../memory/memory.types.js';

const optionalText = z
    .string()
    .nullish()
    .transform(v => (v && v.trim() ? v.trim() : undefined));

/**
 * One restaurant as the upstream API returns it. Id and location arrive
 * under different field names depending on the endpoint version.
 */
export const UpstreamRestaurantSchema = z.object({
    _id: z.union([z.string(), z.number()]).optional(),
    id: z.union([z.string(), z.number()]).optional(),
    name: z.string().min(1),
    cuisine: optionalText,
    location: optionalText,
    place: optionalText,
    address: optionalText,
    area: optionalText,
    rating: z.coerce.number().finite().nullish(),
    price_range: optionalText,
    priceRange: optionalText,
    description: optionalText
});

export type UpstreamRestaurant = z.infer<typeof UpstreamRestaurantSchema>;

export const SearchResponseSchema = z.object({
    restaurants: z.array(z.unknown()).default([])
});

export const CollectionResponseSchema = z.union([
    z.object({ _id: z.union([z.string(), z.number()]) }),
    z.object({ id: z.union([z.string(), z.number()]) }),
    z.object({
        collection: z.object({
            _id: z.union([z.string(), z.number()]).optional(),
            id: z.union([z.string(), z.number()]).optional()
        })
    })
]);

/**
 * Map an upstream record onto RestaurantRecord. Records without an id
 * cannot be saved to a collection and are dropped.
 */
export function normalizeRestaurant(raw: UpstreamRestaurant): RestaurantRecord | null {
    const id = raw._id ?? raw.id;
    if (id === undefined) return null;

    const location = raw.location ?? raw.place ?? raw.address ?? raw.area;
    const priceRange = raw.priceRange ?? raw.price_range;
    const record: RestaurantRecordDTO = { id: String(id), name: raw.name.trim() };

    if (raw.cuisine) record.cuisine = raw.cuisine;
    if (location) record.location = location;
    if (raw.rating !== undefined && raw.rating !== null) record.rating = raw.rating;
    if (priceRange) record.priceRange = priceRange;
    if (raw.description) record.description = raw.description;
    return record;
}

/**
 * Parse the restaurants array item by item; malformed entries are skipped
 * rather than failing the whole result set.
 */
export function parseRestaurants(items: readonly unknown[]): { restaurants: RestaurantRecord[]; skipped: number } {
    const restaurants: RestaurantRecord[] = [];
    let skipped = 0;
    for (const item of items) {
        const parsed = UpstreamRestaurantSchema.safeParse(item);
        const record = parsed.success ? normalizeRestaurant(parsed.data) : null;
        if (record) {
            restaurants.push(record);
        } else {
            skipped++;
        }
    }
    return { restaurants, skipped };
}

export function collectionIdOf(body: z.infer<typeof CollectionResponseSchema>): string | undefined {
    if ('collection' in body) {
        const id = body.collection._id ?? body.collection.id;
        return id === undefined ? undefined : String(id);
    }
    if ('_id' in body) return String(body._id);
    return String(body.id);
}
