import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { describe, it, expect } from 'vitest';
import { PLOT_PRESETS, type PlotPreset } from '@disaster-maps/config';
import type { GeoPoint } from '@disaster-maps/schema';
import { buildFigure, htmlDocument, loadPlotlyBundle, markerSize, plotFilename, renderPlot, toFeatureCollection } from './plot.js';

const POINTS: GeoPoint[] = [
  { latitude: 34, longitude: -118.2, intensity: 4.5, label: 'M 4.5 - Los Angeles' },
  { latitude: 1, longitude: 2, intensity: 0.5 }
];

describe('markerSize', () => {
  it('scales with magnitude but never below 5', () => {
    expect(markerSize(4.5, 'magnitude')).toBe(22.5);
    expect(markerSize(0.5, 'magnitude')).toBe(5);
  });

  it('is constant for fixed sizing', () => {
    expect(markerSize(400, 'fixed')).toBe(10);
  });
});

describe('buildFigure', () => {
  it('builds one scattergeo trace for earthquakes', () => {
    expect(buildFigure(POINTS, PLOT_PRESETS.earthquakes)).toEqual({
      data: [{
        type: 'scattergeo',
        lon: [-118.2, 2],
        lat: [34, 1],
        text: ['M 4.5 - Los Angeles', ''],
        marker: {
          size: [22.5, 5],
          color: [4.5, 0.5],
          colorscale: 'Viridis',
          reversescale: true,
          colorbar: { title: { text: 'Magnitude' } }
        }
      }],
      layout: { title: { text: 'Global Earthquakes (Past 24 Hours)' } }
    });
  });

  it('uses fixed markers and YlOrRd for fires', () => {
    const [trace] = buildFigure(POINTS, PLOT_PRESETS.fires).data;
    expect(trace.marker.size).toEqual([10, 10]);
    expect(trace.marker.colorscale).toBe('YlOrRd');
    expect(trace.marker.reversescale).toBe(false);
  });
});

describe('plotFilename', () => {
  it('slugs the title', () => {
    expect(plotFilename(PLOT_PRESETS.fires.title)).toBe('global_fire_activity.html');
    expect(plotFilename(PLOT_PRESETS.earthquakes.title)).toBe('global_earthquakes_past_24_hours.html');
  });
});

describe('toFeatureCollection', () => {
  it('emits lon/lat point features with a bbox', () => {
    const fc = toFeatureCollection(POINTS);
    expect(fc.type).toBe('FeatureCollection');
    expect(fc.bbox).toEqual([-118.2, 1, 2, 34]);
    expect(fc.features[0].geometry).toEqual({ type: 'Point', coordinates: [-118.2, 34] });
    expect(fc.features[0].properties).toEqual({ intensity: 4.5, label: 'M 4.5 - Los Angeles' });
    expect(fc.features[1].properties).toEqual({ intensity: 0.5 });
  });

  it('leaves the bbox off an empty collection', () => {
    const fc = toFeatureCollection([]);
    expect(fc.features).toEqual([]);
    expect(fc.bbox).toBeUndefined();
  });
});

describe('htmlDocument', () => {
  const preset: PlotPreset = { ...PLOT_PRESETS.fires, title: 'Fires <test>' };

  it('escapes the title and the embedded figure', () => {
    const html = htmlDocument(buildFigure([{ latitude: 0, longitude: 0, intensity: 1, label: '</script>' }], preset), '/* plotly */');
    expect(html).toContain('<title>Fires &lt;test&gt;</title>');
    expect(html).toContain('"text":["\\u003c/script>"]');
    expect(html).toContain('<script>/* plotly */</script>');
  });
});

describe('loadPlotlyBundle', () => {
  it('reads the installed plotly.js bundle', async () => {
    const js = await loadPlotlyBundle();
    expect(js).toContain('Plotly');
  });
});

describe('renderPlot', () => {
  it('writes the HTML plot and a GeoJSON sidecar', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'plot-'));
    try {
      const out = await renderPlot(POINTS, PLOT_PRESETS.earthquakes, { outDir: dir, plotlyJs: '/* plotly */' });
      expect(out).toEqual({
        htmlPath: path.join(dir, 'global_earthquakes_past_24_hours.html'),
        geojsonPath: path.join(dir, 'global_earthquakes_past_24_hours.geojson')
      });
      const html = await fs.readFile(out.htmlPath, 'utf8');
      expect(html).toContain("Plotly.newPlot('plot', fig.data, fig.layout, { responsive: true });");
      const geo = JSON.parse(await fs.readFile(out.geojsonPath, 'utf8'));
      expect(geo.features).toHaveLength(2);
      expect(geo.bbox).toEqual([-118.2, 1, 2, 34]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
