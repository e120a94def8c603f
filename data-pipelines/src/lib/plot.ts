import fs from 'fs/promises';
import path from 'path';
import { createRequire } from 'module';
import bbox from '@turf/bbox';
import { featureCollection, point } from '@turf/helpers';
import type { FeatureCollection, Point } from 'geojson';
import type { GeoPoint } from '@disaster-maps/schema';
import { PATHS, type PlotPreset } from '@disaster-maps/config';
import { ensureDir, slugify, writeJSON } from './utils.js';

export type ScatterGeoTrace = {
  type: 'scattergeo';
  lon: number[];
  lat: number[];
  text: string[];
  marker: {
    size: number[];
    color: number[];
    colorscale: string;
    reversescale: boolean;
    colorbar: { title: { text: string } };
  };
};

export type PlotFigure = {
  data: ScatterGeoTrace[];
  layout: { title: { text: string } };
};

export type PointProps = { intensity: number; label?: string };

export function markerSize(intensity: number, sizing: PlotPreset['sizing']): number {
  return sizing === 'magnitude' ? Math.max(5 * intensity, 5) : 10;
}

export function buildFigure(points: GeoPoint[], preset: PlotPreset): PlotFigure {
  return {
    data: [{
      type: 'scattergeo',
      lon: points.map(p => p.longitude),
      lat: points.map(p => p.latitude),
      text: points.map(p => p.label ?? ''),
      marker: {
        size: points.map(p => markerSize(p.intensity, preset.sizing)),
        color: points.map(p => p.intensity),
        colorscale: preset.colorscale,
        reversescale: preset.reverseScale,
        colorbar: { title: { text: preset.colorbarTitle } }
      }
    }],
    layout: { title: { text: preset.title } }
  };
}

export function plotFilename(title: string): string {
  return `${slugify(title)}.html`;
}

export function toFeatureCollection(points: GeoPoint[]): FeatureCollection<Point, PointProps> {
  const features = points.map(p => {
    const props: PointProps = p.label === undefined ? { intensity: p.intensity } : { intensity: p.intensity, label: p.label };
    return point<PointProps>([p.longitude, p.latitude], props);
  });
  const fc = featureCollection<Point, PointProps>(features);
  if (features.length) fc.bbox = bbox(fc);
  return fc;
}

function escapeHtml(s: string): string {
  return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

// JSON inside <script> must not be able to close the tag
function scriptJSON(obj: unknown): string {
  return JSON.stringify(obj).replace(/</g, '\\u003c');
}

export function htmlDocument(fig: PlotFigure, plotlyJs: string): string {
  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${escapeHtml(fig.layout.title.text)}</title>`,
    `<script>${plotlyJs}</script>`,
    '</head>',
    '<body>',
    '<div id="plot" style="width:100%;height:100vh;"></div>',
    `<script>const fig = ${scriptJSON(fig)}; Plotly.newPlot('plot', fig.data, fig.layout, { responsive: true });</script>`,
    '</body>',
    '</html>',
    ''
  ].join('\n');
}

export async function loadPlotlyBundle(): Promise<string> {
  const require = createRequire(import.meta.url);
  return fs.readFile(require.resolve('plotly.js-dist-min'), 'utf8');
}

export type RenderOptions = { outDir?: string; plotlyJs?: string };

export type RenderedPlot = { htmlPath: string; geojsonPath: string };

export async function renderPlot(points: GeoPoint[], preset: PlotPreset, opts: RenderOptions = {}): Promise<RenderedPlot> {
  const outDir = path.resolve(opts.outDir ?? PATHS.outRoot);
  await ensureDir(outDir);
  const plotlyJs = opts.plotlyJs ?? await loadPlotlyBundle();
  const htmlPath = path.join(outDir, plotFilename(preset.title));
  const geojsonPath = htmlPath.replace(/\.html$/, '.geojson');
  await fs.writeFile(htmlPath, htmlDocument(buildFigure(points, preset), plotlyJs));
  await writeJSON(geojsonPath, toFeatureCollection(points));
  return { htmlPath, geojsonPath };
}
