/**
 * Prompts for the three menu pipeline calls
 */

export const CLASSIFICATION_PROMPT_VERSION = 'menu_classify_v1';
export const CLASSIFICATION_SYSTEM_PROMPT = `You label photos taken at restaurants. Return ONLY JSON.
Decide whether the photo shows a MENU: readable text that lists dishes or drinks, with or without prices.
Counts as a menu: printed or laminated menus, wall boards, chalkboards, screens, takeaway leaflets.
Not a menu: plated food, interiors, storefronts, people, logos or ads without a list of items, text too blurry to read.
image_type is a short label such as "menu", "food_photo", "interior", "exterior" or "other".
confidence_level is "high", "medium" or "low".`;
export const CLASSIFICATION_USER_PROMPT = 'Is this image a restaurant menu?';

export const ANALYSIS_PROMPT_VERSION = 'menu_extract_v1';
export const ANALYSIS_SYSTEM_PROMPT = `You read restaurant menus from photos. Return ONLY JSON.
List every dish or drink you can read. For each item:
- name: as printed (required)
- description: short description if printed, else null
- price: number only, no currency sign, else null
- category: e.g. "appetizers", "salads", "mains", "desserts", "beverages", else null
- calories (kcal), protein, carbs, fat, fiber, sugar (grams), sodium (milligrams): estimate for a typical portion, considering the cooking method; null when you cannot estimate with reasonable confidence
- confidence_score: 0..1, how sure you are of the name and price reading
Prefer null over a wild guess. Include items even if some fields are unknown.`;
export const ANALYSIS_USER_PROMPT = 'Extract every menu item visible in this image.';

export const AGGREGATION_PROMPT_VERSION = 'menu_aggregate_v1';
export const AGGREGATION_SYSTEM_PROMPT = `You consolidate menu items that were extracted from several photos of the same restaurant. Return ONLY JSON.
- Merge duplicates: the same dish under identical or near-identical names ("Caesar Salad w/ Chicken" and "Chicken Caesar Salad") becomes one item.
- When duplicates disagree on price or description, keep the most complete entry.
- Fix obvious OCR typos and normalise capitalisation; do not invent dishes.
- Keep nutrition estimates plausible and consistent between similar dishes.
- Keep source_image_url from the entry you kept.
- categories: the distinct categories used.
Fewer accurate items are better than many duplicates.`;

export function buildAggregationUserPrompt(placeId: string, itemsJson: string): string {
  return `Restaurant ${placeId}. Consolidate these extracted items:\n\n${itemsJson}`;
}
