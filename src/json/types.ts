import { z } from 'zod';

export type GeoPointJson = {
	lat: number;
	lon: number;
	elevationMeters?: number | null;
};

export const GeoPointJsonSchema = z.object({
	lat: z.number(),
	lon: z.number(),
	elevationMeters: z.number().nullable().optional()
});

export const GeoVectorJsonSchema = z.object({
	northing: z.number(),
	easting: z.number(),
	elevationMeters: z.number().optional()
});

export type GeoVectorJson = z.infer<typeof GeoVectorJsonSchema>;

export const GeoLineJsonSchema = z.object({
	southWest: GeoPointJsonSchema,
	northEast: GeoPointJsonSchema
});

export type GeoLineJson = z.infer<typeof GeoLineJsonSchema>;

export const GeoPolyLineJsonSchema = z.object({
	points: z.array(GeoPointJsonSchema).min(2)
});

export type GeoPolyLineJson = z.infer<typeof GeoPolyLineJsonSchema>;

export const GeoHashJsonSchema = z.object({
	hash: z.string().min(1),
	point: GeoPointJsonSchema.optional()
});

export type GeoHashJson = z.infer<typeof GeoHashJsonSchema>;

export const GpsTracePointJsonSchema = z.object({
	time: z.string().datetime({ offset: true }),
	position: GeoPointJsonSchema
});

export type GpsTracePointJson = z.infer<typeof GpsTracePointJsonSchema>;

export const GpsTraceJsonSchema = z.object({
	points: z.array(GpsTracePointJsonSchema)
});

export type GpsTraceJson = z.infer<typeof GpsTraceJsonSchema>;

export type GeoAreaJson =
	| { type: 'rectangle'; southWest: GeoPointJson; northEast: GeoPointJson }
	| { type: 'circle'; center: GeoPointJson; radiusMeters: number }
	| { type: 'inverse'; area: GeoAreaJson }
	| { type: 'union' | 'intersection' | 'difference'; left: GeoAreaJson; right: GeoAreaJson };

export const GeoAreaJsonSchema: z.ZodType<GeoAreaJson> = z.lazy(() =>
	z.union([
		z.object({
			type: z.literal('rectangle'),
			southWest: GeoPointJsonSchema,
			northEast: GeoPointJsonSchema
		}),
		z.object({
			type: z.literal('circle'),
			center: GeoPointJsonSchema,
			radiusMeters: z.number()
		}),
		z.object({
			type: z.literal('inverse'),
			area: GeoAreaJsonSchema
		}),
		z.object({
			type: z.enum(['union', 'intersection', 'difference']),
			left: GeoAreaJsonSchema,
			right: GeoAreaJsonSchema
		})
	])
);
