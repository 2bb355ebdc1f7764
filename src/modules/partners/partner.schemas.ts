import { z } from 'zod';

// GeoJSON position: [lng, lat]
export const positionSchema = z.tuple([
    z.number().min(-180).max(180).describe('longitude'),
    z.number().min(-90).max(90).describe('latitude'),
]);

export const pointSchema = z.object({
    type: z.literal('Point', { error: "address.type must be 'Point'" }),
    coordinates: positionSchema,
});

// Linear ring: at least four positions, the last one closing the ring
const ringSchema = z
    .array(positionSchema)
    .min(4, { error: 'each ring needs at least 4 positions' })
    .refine(
        (ring) => {
            if (ring.length === 0) return true;
            const [firstLng, firstLat] = ring[0];
            const [lastLng, lastLat] = ring[ring.length - 1];
            return firstLng === lastLng && firstLat === lastLat;
        },
        { error: 'each ring must end at its first position' }
    );

export const multiPolygonSchema = z.object({
    type: z.literal('MultiPolygon', { error: "coverageArea.type must be 'MultiPolygon'" }),
    coordinates: z
        .array(z.array(ringSchema).min(1, { error: 'each polygon needs an outer ring' }))
        .min(1, { error: 'coverageArea geometry is empty' }),
});

// Matched by GET /partners/nearest before GET /partners/:id
export const RESERVED_PARTNER_IDS = ['nearest'];

// Clients may send numeric ids; they are stored in their string form
export const partnerIdSchema = z
    .union([z.string().trim().min(1), z.number()])
    .transform((v) => String(v))
    .refine((id) => !RESERVED_PARTNER_IDS.includes(id), { error: 'id is reserved' });

export const createPartnerBodySchema = z.object({
    id: partnerIdSchema.optional(),
    tradingName: z.string().trim().min(1),
    ownerName: z.string().trim().min(1),
    document: z.string().trim().min(1),
    coverageArea: multiPolygonSchema,
    address: pointSchema,
});

export const partnerSchema = z.object({
    id: z.string(),
    tradingName: z.string(),
    ownerName: z.string(),
    document: z.string(),
    coverageArea: multiPolygonSchema,
    address: pointSchema,
});

export const partnerParamsSchema = z.object({
    id: z.string().min(1),
});

// Query values arrive as strings; blank ones must not coerce to 0
function coordinateParam(min: number, max: number, name: string) {
    return z
        .string()
        .trim()
        .min(1, { error: `${name} is required` })
        .pipe(z.coerce.number<string>().min(min).max(max))
        .describe(name);
}

export const nearestQuerySchema = z.object({
    lng: coordinateParam(-180, 180, 'longitude'),
    lat: coordinateParam(-90, 90, 'latitude'),
});

export const partnerCreatedSchema = z.object({
    status: z.literal('created'),
    id: z.string(),
});

export const errorResponseSchema = z.object({
    statusCode: z.number(),
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional(),
});

export type CreatePartnerInput = z.infer<typeof createPartnerBodySchema>;
export type Partner = z.infer<typeof partnerSchema>;
export type NearestQuery = z.infer<typeof nearestQuerySchema>;
