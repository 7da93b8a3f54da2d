import { ApifyPlaceItemSchema, type ApifyPlaceItem, type PlaceRecord } from './places.types.js';

export function mapApifyPlace(item: ApifyPlaceItem): PlaceRecord {
  return {
    name: item.title || 'Unknown',
    address: item.address || 'Address not available',
    rating: item.totalScore ?? 0,
    reviewsCount: item.reviewsCount ?? 0,
    category: item.categoryName || 'Restaurant',
    phone: item.phone ?? '',
    website: item.website ?? '',
    priceLevel: item.priceLevel ?? item.price ?? '',
    openingHours: item.openingHours ?? [],
    location: {
      lat: item.location?.lat ?? 0,
      lng: item.location?.lng ?? 0
    },
    placeId: item.placeId ?? '',
    url: item.url ?? '',
    imageUrls: item.imageUrls ?? []
  };
}

/**
 * Validate and map a raw dataset. Items that are not objects or carry no
 * place id are dropped: nothing downstream can key them.
 */
export function mapApifyDataset(items: readonly unknown[]): { places: PlaceRecord[]; dropped: number } {
  const places: PlaceRecord[] = [];
  let dropped = 0;
  for (const raw of items) {
    const parsed = ApifyPlaceItemSchema.safeParse(raw);
    if (!parsed.success || !parsed.data.placeId) {
      dropped++;
      continue;
    }
    places.push(mapApifyPlace(parsed.data));
  }
  return { places, dropped };
}
