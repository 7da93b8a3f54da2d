import { z } from 'zod';
import type { Request, Response } from 'express';
import { RESTAURANT_SORTS } from '../services/catalog/catalog.service.js';

const latitude = z.coerce.number().min(-90).max(90);
const longitude = z.coerce.number().min(-180).max(180);
const page = z.coerce.number().int().min(1).default(1);
const radius = z.coerce.number().min(0.1).max(50).default(10);

export const ScanNearbySchema = z.object({
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
    radius: z.number().positive().max(50).optional()
});

export const RestaurantListQuerySchema = z.object({
    latitude,
    longitude,
    page,
    limit: z.coerce.number().int().min(1).max(100).default(20),
    radius,
    sort_by: z.enum(RESTAURANT_SORTS).default('distance')
});

export const OptionalOriginQuerySchema = z.object({
    latitude: latitude.optional(),
    longitude: longitude.optional()
});

export const MenuItemListQuerySchema = z.object({
    latitude,
    longitude,
    page,
    limit: z.coerce.number().int().min(1).max(100).default(20),
    radius,
    sort_by: z.string().default('restaurant_distance'),
    sort_order: z.string().default('asc'),
    restaurant_id: z.string().min(1).optional()
});

export const RestaurantMenuQuerySchema = OptionalOriginQuerySchema.extend({
    page,
    limit: z.coerce.number().int().min(1).max(100).default(50),
    sort_by: z.string().default('name'),
    sort_order: z.string().default('asc')
});

const workers = z.number().int().min(1).max(32).optional();

export const ProcessMenusSchema = z.object({
    restaurant_ids: z.array(z.string().min(1)).optional(),
    max_workers: workers,
    classification_workers: workers,
    analysis_workers: workers,
    background: z.boolean().default(true)
});

export function sendValidationError(req: Request, res: Response, details: unknown, error = 'Invalid request'): void {
    req.log.warn({ details }, '[API] Invalid request');
    res.status(400).json({
        error,
        code: 'VALIDATION_ERROR',
        traceId: req.traceId,
        details
    });
}
