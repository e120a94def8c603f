export const SOURCES = {
  fires: 'https://raw.githubusercontent.com/ehmatthes/pcc_2e/master/chapter_16/mapping_global_data_sets/data/world_fires_1_day.csv',
  earthquakes: 'https://earthquake.usgs.gov/earthquakes/feed/v1.0/summary/all_day.geojson'
};

export const FETCH = {
  timeoutMs: 15_000,
  userAgent: 'disaster-maps/0.1'
};

export const PATHS = {
  outRoot: 'data/out'
};

export const FIRE_FIELD_ALIASES = {
  latitude: ['latitude', 'lat'],
  longitude: ['longitude', 'lon', 'lng'],
  brightness: ['brightness', 'bright_ti4', 'bright_t31'],
  acqDate: ['acq_date'],
  acqTime: ['acq_time']
} satisfies Record<string, string[]>;

export type FireField = keyof typeof FIRE_FIELD_ALIASES;

export type MarkerSizing = 'magnitude' | 'fixed';

export type PlotPreset = {
  title: string;
  colorbarTitle: string;
  colorscale: string;
  reverseScale: boolean;
  sizing: MarkerSizing;
};

export const PLOT_PRESETS = {
  fires: {
    title: 'Global Fire Activity',
    colorbarTitle: 'Brightness',
    colorscale: 'YlOrRd',
    reverseScale: false,
    sizing: 'fixed'
  },
  earthquakes: {
    title: 'Global Earthquakes (Past 24 Hours)',
    colorbarTitle: 'Magnitude',
    colorscale: 'Viridis',
    reverseScale: true,
    sizing: 'magnitude'
  }
} satisfies Record<string, PlotPreset>;
