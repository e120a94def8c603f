import { z } from 'zod';

export const GeoPoint = z.object({
  latitude: z.number().finite().min(-90).max(90),
  longitude: z.number().finite().min(-180).max(180),
  intensity: z.number().finite().nonnegative(),
  label: z.string().optional(),
});

export type GeoPoint = z.infer<typeof GeoPoint>;

// USGS summary feeds: https://earthquake.usgs.gov/earthquakes/feed/v1.0/geojson.php
export const UsgsFeed = z.object({
  type: z.string().optional(),
  features: z.array(z.unknown()),
});
export type UsgsFeed = z.infer<typeof UsgsFeed>;

export const UsgsFeature = z.object({
  properties: z.object({
    mag: z.number(),
    // labels only; a bad one never costs the point
    place: z.string().nullish().catch(undefined),
    title: z.string().nullish().catch(undefined),
  }),
  geometry: z.object({
    // [lon, lat, depth]
    coordinates: z.tuple([z.number(), z.number()]).rest(z.number()),
  }),
});
export type UsgsFeature = z.infer<typeof UsgsFeature>;
