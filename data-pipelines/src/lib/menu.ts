import { PLOT_PRESETS, SOURCES, type PlotPreset } from '@disaster-maps/config';
import type { GeoPoint } from '@disaster-maps/schema';
import { loadEarthquakes } from './earthquakes.js';
import { loadFires } from './fires.js';
import { renderPlot, type RenderedPlot } from './plot.js';
import type { LoadResult, LoadSummary } from './result.js';
import { errorMessage } from './utils.js';

export const BANNER = 'Global Disaster Visualization';

export const MENU_LINES = [
  '1. Fire activity (past day)',
  '2. Earthquakes (past 24 hours)',
  '3. Exit'
];

export const PROMPT = 'Enter your choice (1-3): ';

export type MenuDeps = {
  loadFires: (location: string) => Promise<LoadResult<LoadSummary>>;
  loadEarthquakes: (url: string) => Promise<LoadResult<LoadSummary>>;
  render: (points: GeoPoint[], preset: PlotPreset) => Promise<RenderedPlot>;
  log: (msg: string) => void;
  error: (msg: string) => void;
};

export const defaultDeps: MenuDeps = {
  loadFires: (location) => loadFires(location),
  loadEarthquakes: (url) => loadEarthquakes(url),
  render: (points, preset) => renderPlot(points, preset),
  log: (msg) => console.log(msg),
  error: (msg) => console.error(msg)
};

export type MenuOutcome = 'continue' | 'exit';

async function visualize(
  what: string,
  load: () => Promise<LoadResult<LoadSummary>>,
  preset: PlotPreset,
  deps: MenuDeps
): Promise<void> {
  deps.log(`Fetching ${what} data...`);
  const res = await load();
  if (!res.ok) {
    deps.error(`${res.error.kind}: ${res.error.message}`);
    return;
  }
  const { points, total, skipped } = res.value;
  deps.log(`Loaded ${points.length} of ${total} ${what} records (${skipped} skipped)`);
  try {
    const out = await deps.render(points, preset);
    deps.log(`Plot saved as ${out.htmlPath} (open it in a browser to view the map)`);
  } catch (e) {
    deps.error(`Rendering ${what} plot failed: ${errorMessage(e)}`);
  }
}

export async function runChoice(choice: string, deps: MenuDeps = defaultDeps): Promise<MenuOutcome> {
  switch (choice.trim()) {
    case '1':
      await visualize('fire', () => deps.loadFires(SOURCES.fires), PLOT_PRESETS.fires, deps);
      return 'continue';
    case '2':
      await visualize('earthquake', () => deps.loadEarthquakes(SOURCES.earthquakes), PLOT_PRESETS.earthquakes, deps);
      return 'continue';
    case '3':
      deps.log('Exiting program.');
      return 'exit';
    default:
      deps.log('Invalid choice. Please enter 1, 2, or 3.');
      return 'continue';
  }
}
