import { GeoPoint, UsgsFeature, UsgsFeed } from '@disaster-maps/schema';
import { errorMessage } from './utils.js';
import { readSource, type SourceOptions } from './source.js';
import { fail, summarize, type LoadResult, type LoadSummary } from './result.js';

export function featureToGeoPoint(raw: unknown): GeoPoint | null {
  const f = UsgsFeature.safeParse(raw);
  if (!f.success) return null;
  // GeoJSON order: longitude first
  const [longitude, latitude] = f.data.geometry.coordinates;
  const label = f.data.properties.title ?? f.data.properties.place ?? undefined;
  const intensity = f.data.properties.mag;
  const p = GeoPoint.safeParse(label === undefined ? { latitude, longitude, intensity } : { latitude, longitude, intensity, label });
  return p.success ? p.data : null;
}

export function parseEarthquakeFeed(text: string): LoadResult<LoadSummary> {
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (e) {
    return fail('ParseFailure', `Earthquake feed is not valid JSON: ${errorMessage(e)}`, e);
  }
  const feed = UsgsFeed.safeParse(doc);
  if (!feed.success) return fail('ParseFailure', 'Earthquake feed has no "features" array', feed.error);

  const points: GeoPoint[] = [];
  for (const raw of feed.data.features) {
    const p = featureToGeoPoint(raw);
    if (p) points.push(p);
  }
  return summarize(points, feed.data.features.length, 'earthquake features');
}

export async function loadEarthquakes(url: string, opts: SourceOptions = {}): Promise<LoadResult<LoadSummary>> {
  const src = await readSource(url, opts);
  if (!src.ok) return src;
  return parseEarthquakeFeed(src.value);
}
