/**
 * Dataset identifiers and the dataset creation payload for OGR-readable uploads.
 */

import type { SpatialReference } from "./geo.js";
import type { TimeStep } from "./time.js";
import type { VectorColumnType, VectorDataType } from "./descriptors.js";

export interface InternalDatasetIdResponse {
  type: "internal";
  datasetId: string;
}

export interface ExternalDatasetIdResponse {
  type: "external";
  providerId: string;
  datasetId: string;
}

export type DatasetId = InternalDatasetIdResponse | ExternalDatasetIdResponse;

export interface UploadResponse {
  id: string;
}

export interface CreateDatasetResponse {
  id: DatasetId;
}

// ---------------------------------------------------------------------------
// OGR source time specification
// ---------------------------------------------------------------------------

export type OgrSourceTimeFormatDict =
  | { format: "seconds" }
  | { format: "auto" }
  | { format: "custom"; customFormat: string };

export type OgrSourceDurationDict =
  | { type: "zero" }
  | { type: "infinite" }
  | ({ type: "value" } & TimeStep);

export type OgrSourceDatasetTimeTypeDict =
  | { type: "none" }
  | {
      type: "start";
      startField: string;
      startFormat: OgrSourceTimeFormatDict;
      duration: OgrSourceDurationDict;
    }
  | {
      type: "start+end";
      startField: string;
      startFormat: OgrSourceTimeFormatDict;
      endField: string;
      endFormat: OgrSourceTimeFormatDict;
    }
  | {
      type: "start+duration";
      startField: string;
      startFormat: OgrSourceTimeFormatDict;
      durationField: string;
    };

export type OgrOnError = "ignore" | "abort";

// ---------------------------------------------------------------------------
// Dataset creation
// ---------------------------------------------------------------------------

export interface OgrSourceColumns {
  x: string;
  y?: string;
  float: string[];
  int: string[];
  text: string[];
}

export interface OgrLoadingInfo {
  fileName: string;
  layerName: string;
  dataType: VectorDataType;
  time: OgrSourceDatasetTimeTypeDict;
  columns: OgrSourceColumns;
  onError: OgrOnError;
}

export interface CreateDatasetRequest {
  upload: string;
  definition: {
    properties: {
      name: string;
      description: string;
      sourceOperator: "OgrSource";
    };
    metaData: {
      type: "OgrMetaData";
      loadingInfo: OgrLoadingInfo;
      resultDescriptor: {
        type: "vector";
        dataType: VectorDataType;
        columns: Record<string, VectorColumnType>;
        spatialReference: SpatialReference;
      };
    };
  };
}
