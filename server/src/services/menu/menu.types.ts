/**
 * Menu pipeline types
 *
 * LLM output schemas (snake_case, as sent to the model) and the camelCase
 * domain records the stages hand to each other.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// LLM output schemas
// ---------------------------------------------------------------------------

export const MenuClassificationSchema = z.object({
  is_menu: z.boolean(),
  confidence_level: z.enum(['high', 'medium', 'low']),
  reasoning: z.string(),
  image_type: z.string()
});

export const ExtractedMenuItemSchema = z.object({
  name: z.string(),
  description: z.string().nullable(),
  price: z.number().nullable(),
  category: z.string().nullable(),
  calories: z.number().nullable(),
  protein: z.number().nullable(),
  carbs: z.number().nullable(),
  fat: z.number().nullable(),
  fiber: z.number().nullable(),
  sugar: z.number().nullable(),
  sodium: z.number().nullable(),
  confidence_score: z.number().min(0).max(1).nullable()
});

export const MenuAnalysisSchema = z.object({
  menu_items: z.array(ExtractedMenuItemSchema),
  has_prices: z.boolean(),
  has_descriptions: z.boolean()
});

export const AggregatedMenuSchema = z.object({
  menu_items: z.array(ExtractedMenuItemSchema.extend({
    source_image_url: z.string().nullable()
  })),
  categories: z.array(z.string()),
  notes: z.string().nullable()
});

export type MenuClassification = z.infer<typeof MenuClassificationSchema>;
export type ExtractedMenuItem = z.infer<typeof ExtractedMenuItemSchema>;
export type MenuAnalysis = z.infer<typeof MenuAnalysisSchema>;
export type AggregatedMenu = z.infer<typeof AggregatedMenuSchema>;

// ---------------------------------------------------------------------------
// Domain records
// ---------------------------------------------------------------------------

export type ConfidenceLevel = MenuClassification['confidence_level'];

export interface ImageClassification {
  imageUrl: string;
  isMenu: boolean;
  confidence: ConfidenceLevel;
  reasoning: string;
  imageType: string;
  /** Set when the call failed and the image was counted as non-menu */
  error?: string;
}

export interface ClassificationOutcome {
  /** Positively classified URLs, in priority order */
  menuImages: string[];
  results: ImageClassification[];
}

export interface NutritionFields {
  calories: number | null;
  protein: number | null;
  carbs: number | null;
  fat: number | null;
  fiber: number | null;
  sugar: number | null;
  sodium: number | null;
}

export interface RawMenuItem extends NutritionFields {
  name: string;
  description: string | null;
  price: number | null;
  category: string | null;
  confidenceScore: number | null;
  sourceImageUrl: string | null;
}

export interface ConsolidatedMenuItem extends RawMenuItem {
  placeId: string;
}

export interface RestaurantSummary {
  placeId: string;
  totalImages: number;
  menuImagesFound: number;
  totalMenuItems: number;
  elapsedMs: number;
  /** null on success */
  error: string | null;
}

export const NUTRITION_FIELDS = [
  'calories', 'protein', 'carbs', 'fat', 'fiber', 'sugar', 'sodium'
] as const satisfies readonly (keyof NutritionFields)[];

export function toRawMenuItem(item: ExtractedMenuItem, sourceImageUrl: string | null): RawMenuItem {
  return {
    name: item.name.trim(),
    description: item.description,
    price: item.price,
    category: item.category,
    calories: item.calories,
    protein: item.protein,
    carbs: item.carbs,
    fat: item.fat,
    fiber: item.fiber,
    sugar: item.sugar,
    sodium: item.sodium,
    confidenceScore: item.confidence_score,
    sourceImageUrl
  };
}
