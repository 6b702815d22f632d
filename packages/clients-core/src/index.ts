// Base
export { BaseClient, type ClientConfig, type RequestParams } from "./baseClient.js";

// Domain clients
export { SessionClient } from "./sessionClient.js";
export { WorkflowClient } from "./workflowClient.js";
export { OgcClient, wfsQuery, wmsQuery, type WfsRequest, type WmsRequest } from "./ogcClient.js";
export { PlotClient, type PlotRequest } from "./plotClient.js";
export { DatasetClient, type UploadFile } from "./datasetClient.js";

// Errors
export { GeoEngineError, isErrorResponse, checkResponseForError } from "./errors.js";

// Logging
export {
  createConsoleLogger,
  silentLogger,
  type Logger,
  type ConsoleLoggerOptions,
} from "./logger.js";

// Validation
export { parseResponse } from "./schemas.js";

export { CLIENT_VERSION, DEFAULT_USER_AGENT } from "./version.js";
