// Browser-side data layer: API client, dashboard store and chart-spec builders.
export { fetchViews, fetchLocations, fetchStats, refreshData, toQuery, withColdStartRetry, ApiError } from './services/api';
export { default as useDashboardStore, departmentsOf, communesOf, regionOfDepartment, mergeParams, INITIAL_STATE } from './stores/useDashboardStore';
export { choroplethSpec, pieSpec, lineSpec, histogramSpec, PROPERTY_TYPE_LABELS } from './charts';
export { colors, sequentialPalette, sequentialColor, propertyTypeColors, seriesColors, noDataColor } from './theme';
export { PROPERTY_TYPES, GEO_LEVELS } from './types';
export type * from './types';
