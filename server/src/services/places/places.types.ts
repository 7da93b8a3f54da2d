import { z } from 'zod';

export const OpeningHoursSchema = z.object({
  day: z.string(),
  hours: z.string()
});

export type OpeningHours = z.infer<typeof OpeningHoursSchema>;

/**
 * One dataset item of the Google Maps crawler actor.
 * Unknown fields are ignored; missing ones fall back to neutral values.
 */
export const ApifyPlaceItemSchema = z.object({
  title: z.string().nullish(),
  address: z.string().nullish(),
  totalScore: z.number().nullish(),
  reviewsCount: z.number().nullish(),
  categoryName: z.string().nullish(),
  phone: z.string().nullish(),
  website: z.string().nullish(),
  price: z.string().nullish(),
  priceLevel: z.string().nullish(),
  openingHours: z.array(OpeningHoursSchema).nullish().catch(null),
  location: z.object({
    lat: z.number(),
    lng: z.number()
  }).nullish().catch(null),
  placeId: z.string().nullish(),
  url: z.string().nullish(),
  imageUrls: z.array(z.string()).nullish().catch(null)
});

export type ApifyPlaceItem = z.infer<typeof ApifyPlaceItemSchema>;

export interface PlaceRecord {
  name: string;
  address: string;
  rating: number;
  reviewsCount: number;
  category: string;
  phone: string;
  website: string;
  priceLevel: string;
  openingHours: OpeningHours[];
  location: { lat: number; lng: number };
  placeId: string;
  url: string;
  imageUrls: string[];
}

export interface SearchLocation {
  latitude: number;
  longitude: number;
}

export interface PlacesProvider {
  searchRestaurants(location: SearchLocation, opts?: { traceId?: string }): Promise<PlaceRecord[]>;
}
