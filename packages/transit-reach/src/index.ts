/**
 * transit-reach - Public Transport Accessibility Analysis
 *
 * Batch runs against an OpenTripPlanner router:
 * - Reachability matrices from isochrones of many origins
 * - Common reachable area across origins
 * - Point-to-point journey tables, nearest-destination and time-series trips
 * - Choropleth measures per origin area
 *
 * @packageDocumentation
 */

// Core types and errors
export {
  DEFAULT_TRAVEL_PARAMS,
  ok,
  err,
  type Point,
  type QueryTime,
  type TravelParams,
  type PolygonalGeometry,
  type BBox,
  type Result,
} from './core/types.js';
export {
  TransitReachError,
  RequestError,
  ParseError,
  ConfigurationError,
  type ItemError,
  type TransitReachErrorCode,
} from './core/errors.js';
export { parseQueryTime, buildTimeSeries, formatOtpTime, formatQueryTime } from './core/query-time.js';
export {
  loadConfig,
  buildRouterUrl,
  DEFAULT_CONFIG,
  type RouterConfig,
  type TransitReachConfig,
  type LoadConfigOptions,
} from './core/config.js';
export {
  Logger,
  createLogger,
  logger,
  silentLogger,
  withContext,
  type LoggerLike,
  type LogLevel,
  type LogFormat,
  type LogWriter,
} from './core/utils/logger.js';

// Routing
export {
  rawSuccess,
  rawFailure,
  type RawResult,
  type RawSuccess,
  type RawFailure,
  type RequestOptions,
  type RoutingClient,
} from './routing/types.js';
export { OtpRoutingClient, formatPlace, type OtpRoutingClientOptions } from './routing/otp-client.js';
export { resolveModes, normalizeModes, accessTimeColumn } from './routing/modes.js';

// Geometry
export {
  TurfGeometryService,
  emptyPolygon,
  isEmptyPolygon,
  extractPolygonal,
  type GeometryService,
  type LatLon,
} from './geometry/geometry-service.js';

// Batch execution
export {
  forEach,
  computeProgress,
  formatProgressMessage,
  SUCCESS,
  failure,
  dropped,
  type ItemOutcome,
  type BatchOptions,
  type BatchProgress,
  type BatchSummary,
} from './batch/batch-runner.js';
export { FailureSet, type FailureRecord, type ExclusionReport } from './batch/failure-set.js';
export { ItemStateTracker, isTerminalState, type ItemState } from './batch/item-state.js';

// Isochrones
export {
  parsePolygonSet,
  footprint,
  DEFAULT_SIMPLIFY_TOLERANCE,
  type CutoffPolygon,
  type PolygonSet,
} from './isochrone/polygon-set.js';
export {
  buildRow,
  ReachabilityMatrix,
  UNREACHABLE,
  type ReachabilityRow,
  type FinalReachabilityMatrix,
  type FinalReachabilityRow,
} from './isochrone/reachability.js';
export {
  MultiOriginAggregator,
  FileCheckpointSink,
  DEFAULT_CHECKPOINT_EVERY,
  type CheckpointSink,
  type CheckpointSnapshot,
  type MultiOriginRunOptions,
  type MultiOriginResult,
} from './isochrone/multi-origin-aggregator.js';
export { IntersectionEngine, type IntersectionStep } from './isochrone/intersection-engine.js';
export {
  MultiIntersect,
  resolveOriginRequest,
  type MultiIntersectOptions,
  type IntersectionRunResult,
  type TimeSeriesIntersection,
} from './isochrone/multi-intersect.js';

// Trips
export { parseItinerary, toTripRow, type Itinerary, type TripLeg, type TripRow } from './trips/itinerary.js';
export {
  PointToPointLoop,
  buildPairs,
  isLoopType,
  LOOP_TYPES,
  type LoopType,
  type PointToPointOptions,
  type PointToPointResult,
} from './trips/point-to-point-loop.js';
export {
  PointToPointNearest,
  nearestPairs,
  type NearestPair,
  type PointToPointNearestOptions,
  type PointToPointNearestResult,
} from './trips/point-to-point-nearest.js';
export {
  PointToPointTime,
  type TimedTripRow,
  type PointToPointTimeOptions,
  type PointToPointTimeResult,
} from './trips/point-to-point-time.js';
export {
  runTripBatch,
  DEFAULT_TRIP_CHECKPOINT_EVERY,
  type TripRequest,
  type TripCheckpointSink,
  type TripBatchOptions,
  type TripBatchResult,
} from './trips/trip-batch.js';

// Choropleth
export {
  Choropleth,
  categorize,
  joinChoropleth,
  DEFAULT_CHOROPLETH_CUTOFFS,
  type ChoroplethCutoffs,
  type ChoroplethRow,
  type ChoroplethResult,
} from './choropleth/choropleth.js';

// Input and output
export { parseCsv, formatCsv, type CsvColumn, type CsvTable } from './io/csv.js';
export { loadPoints, parsePoints, selectRow, type LoadPointsOptions } from './io/points.js';
export { PostcodeGeocoder, normalizePostcode, type Geocoder } from './io/geocoder.js';
export {
  formatMatrixCsv,
  formatFailuresCsv,
  formatTripCsv,
  formatTripTimeCsv,
  formatChoroplethCsv,
  cutoffPolygonsToGeoJSON,
  geometryToGeoJSON,
  CsvTripCheckpointSink,
  CsvTimedTripCheckpointSink,
} from './io/outputs.js';
