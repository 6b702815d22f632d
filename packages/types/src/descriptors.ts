/**
 * Result descriptors as returned by `GET /workflow/{id}/metadata`.
 *
 * A result descriptor tells what kind of output a workflow produces
 * (vector features, raster tiles or a plot) and in which spatial
 * reference system.
 */

import type { SpatialReference } from "./geo.js";

export type VectorDataType = "Data" | "MultiPoint" | "MultiLineString" | "MultiPolygon";

export type RasterDataType =
  | "U8"
  | "U16"
  | "U32"
  | "U64"
  | "I8"
  | "I16"
  | "I32"
  | "I64"
  | "F32"
  | "F64";

/** Column data type of a vector layer, e.g. "float", "int", "text" */
export type VectorColumnType = string;

export interface UnitlessMeasurement {
  type: "unitless";
}

export interface ContinuousMeasurement {
  type: "continuous";
  measurement: string;
  unit?: string | null;
}

export interface ClassificationMeasurement {
  type: "classification";
  measurement: string;
  classes: Record<string, string>;
}

export type Measurement = UnitlessMeasurement | ContinuousMeasurement | ClassificationMeasurement;

export interface VectorResultDescriptorResponse {
  type: "vector";
  dataType: VectorDataType;
  spatialReference: SpatialReference;
  columns: Record<string, VectorColumnType>;
}

export interface RasterResultDescriptorResponse {
  type: "raster";
  dataType: RasterDataType;
  spatialReference: SpatialReference;
  measurement: Measurement;
  noDataValue?: number | null;
}

export interface PlotResultDescriptorResponse {
  type: "plot";
  spatialReference?: SpatialReference | null;
}

export type ResultDescriptorResponse =
  | VectorResultDescriptorResponse
  | RasterResultDescriptorResponse
  | PlotResultDescriptorResponse;

export type ResultType = ResultDescriptorResponse["type"];
