/**
 * @geoengine-ts/sdk
 *
 * Client for the Geo Engine geospatial processing service.
 *
 * @example
 * await initialize("http://localhost:3030/api");
 * const workflow = await workflowById("0f5b3c2a-1d4e-4f6a-9b8c-7d6e5f4a3b2c");
 * const frame = await workflow.getDataframe(
 *   new QueryRectangle([-60, 5, 61, 80], ["2014-04-01T12:00:00Z", "2014-04-01T12:00:00Z"]),
 * );
 */

// Session
export {
  Session,
  initialize,
  getSession,
  reset,
  type Credentials,
  type InitializeOptions,
} from "./auth.js";
export { readSettings, loadDotenv, type Settings } from "./config.js";

// Queries and results
export { QueryRectangle, DEFAULT_RESOLUTION, DEFAULT_SRS, type TimeInput } from "./queryRectangle.js";
export {
  VectorResultDescriptor,
  RasterResultDescriptor,
  PlotResultDescriptor,
  resultDescriptorFromResponse,
  type ResultDescriptor,
} from "./resultDescriptor.js";
export { GeoDataFrame, type GeoDataFrameRow } from "./geoDataFrame.js";

// Workflows
export { Workflow, workflowById, registerWorkflow, type PlotChart } from "./workflow.js";

// Datasets
export {
  InternalDatasetId,
  OgrSourceTimeFormat,
  OgrSourceDuration,
  OgrSourceDatasetTimeType,
  uploadDataframe,
  columnTypeOf,
  vectorDataTypeOf,
  type ColumnType,
  type UploadOptions,
} from "./datasets.js";

// Styling
export { Colorizer, type Breakpoint } from "./colorizer.js";

// Errors
export {
  GeoEngineError,
  InputError,
  UninitializedError,
  ResultTypeError,
  MethodNotCalledOnVectorError,
  MethodNotCalledOnRasterError,
  MethodNotCalledOnPlotError,
  SpatialReferenceMismatchError,
} from "./errors.js";

// Types
export type {
  BoundingBox2D,
  BoundsTuple,
  SpatialResolution,
  SpatialReference,
  RgbaColor,
  TimeInterval,
  TimeStep,
  TimeGranularity,
  WorkflowId,
  WorkflowDefinition,
  ProvenanceEntry,
  DatasetId,
  OgrOnError,
} from "@geoengine-ts/types";
