import Papa from 'papaparse';
import { GeoPoint } from '@disaster-maps/schema';
import { FIRE_FIELD_ALIASES, type FireField } from '@disaster-maps/config';
import { normalizeHeaderKey, toFloat } from './utils.js';
import { readSource, type SourceOptions } from './source.js';
import { fail, summarize, type LoadResult, type LoadSummary } from './result.js';

export type FireRow = Record<string, string | undefined>;

/** Header names actually present in the file for each field we read. */
export type FireColumns = {
  latitude: string;
  longitude: string;
  brightness: string;
  acqDate?: string;
  acqTime?: string;
};

function findColumn(fields: string[], target: FireField): string | undefined {
  const byNorm = new Map<string, string>();
  for (const f of fields) {
    const k = normalizeHeaderKey(f);
    if (!byNorm.has(k)) byNorm.set(k, f);
  }
  for (const alias of FIRE_FIELD_ALIASES[target]) {
    const hit = byNorm.get(normalizeHeaderKey(alias));
    if (hit !== undefined) return hit;
  }
  return undefined;
}

export function resolveFireColumns(fields: string[]): FireColumns | null {
  const latitude = findColumn(fields, 'latitude');
  const longitude = findColumn(fields, 'longitude');
  const brightness = findColumn(fields, 'brightness');
  if (!latitude || !longitude || !brightness) return null;
  return {
    latitude,
    longitude,
    brightness,
    acqDate: findColumn(fields, 'acqDate'),
    acqTime: findColumn(fields, 'acqTime')
  };
}

export type FireTable = { fields: string[]; rows: Generator<FireRow, void, undefined> };

export function readFireRows(text: string): FireTable {
  const res = Papa.parse<FireRow>(text, { header: true, skipEmptyLines: 'greedy' });
  const data = res.data;
  function* rows(): Generator<FireRow, void, undefined> {
    for (const row of data) yield row;
  }
  return { fields: res.meta.fields ?? [], rows: rows() };
}

function fireLabel(row: FireRow, cols: FireColumns): string | undefined {
  const date = cols.acqDate ? row[cols.acqDate]?.trim() : undefined;
  if (!date) return undefined;
  const time = cols.acqTime ? row[cols.acqTime]?.trim() : undefined;
  if (!time || !/^\d{1,4}$/.test(time)) return date;
  const hhmm = time.padStart(4, '0');
  return `${date} ${hhmm.slice(0, 2)}:${hhmm.slice(2)}`;
}

export function parseFireRow(row: FireRow, cols: FireColumns): GeoPoint | null {
  const latitude = toFloat(row[cols.latitude]);
  const longitude = toFloat(row[cols.longitude]);
  const intensity = toFloat(row[cols.brightness]);
  if (latitude === undefined || longitude === undefined || intensity === undefined) return null;
  const label = fireLabel(row, cols);
  const parsed = GeoPoint.safeParse(label === undefined ? { latitude, longitude, intensity } : { latitude, longitude, intensity, label });
  return parsed.success ? parsed.data : null;
}

export function parseFireCsv(text: string): LoadResult<LoadSummary> {
  const table = readFireRows(text);
  const cols = resolveFireColumns(table.fields);
  if (!cols) {
    return fail('ParseFailure', `CSV header lacks latitude/longitude/brightness columns (found: ${table.fields.join(', ') || 'none'})`);
  }
  const points: GeoPoint[] = [];
  let total = 0;
  for (const row of table.rows) {
    total++;
    const p = parseFireRow(row, cols);
    if (p) points.push(p);
  }
  return summarize(points, total, 'fire rows');
}

export async function loadFires(location: string, opts: SourceOptions = {}): Promise<LoadResult<LoadSummary>> {
  const src = await readSource(location, opts);
  if (!src.ok) return src;
  return parseFireCsv(src.value);
}
