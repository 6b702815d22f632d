/**
 * Dataset upload: turn a GeoDataFrame into a dataset on the server.
 */

import { DatasetClient, GeoEngineError } from "@geoengine-ts/clients-core";
import type {
  CreateDatasetRequest,
  DatasetId,
  OgrOnError,
  OgrSourceDatasetTimeTypeDict,
  OgrSourceDurationDict,
  OgrSourceTimeFormatDict,
  TimeStep,
  VectorDataType,
} from "@geoengine-ts/types";
import { getSession } from "./auth.js";
import { InputError } from "./errors.js";
import type { GeoDataFrame } from "./geoDataFrame.js";

// ---------------------------------------------------------------------------
// Identifiers
// ---------------------------------------------------------------------------

export class InternalDatasetId {
  readonly datasetId: string;

  constructor(datasetId: string) {
    this.datasetId = datasetId;
  }

  static fromResponse(id: DatasetId): InternalDatasetId {
    if (id.type !== "internal") {
      throw new GeoEngineError({
        error: "UnexpectedResponse",
        message: `Expected an internal dataset id, got ${id.type}`,
      });
    }
    return new InternalDatasetId(id.datasetId);
  }

  equals(other: InternalDatasetId): boolean {
    return this.datasetId === other.datasetId;
  }

  toString(): string {
    return this.datasetId;
  }

  toDict(): DatasetId {
    return { type: "internal", datasetId: this.datasetId };
  }
}

// ---------------------------------------------------------------------------
// Time specification
// ---------------------------------------------------------------------------

/** How a time column is written */
export const OgrSourceTimeFormat = {
  seconds: (): OgrSourceTimeFormatDict => ({ format: "seconds" }),
  auto: (): OgrSourceTimeFormatDict => ({ format: "auto" }),
  custom: (customFormat: string): OgrSourceTimeFormatDict => ({ format: "custom", customFormat }),
};

/** How long a feature is valid when only its start is known */
export const OgrSourceDuration = {
  zero: (): OgrSourceDurationDict => ({ type: "zero" }),
  infinite: (): OgrSourceDurationDict => ({ type: "infinite" }),
  value: (step: TimeStep): OgrSourceDurationDict => ({ type: "value", ...step }),
};

/** Where a dataset's features get their time from */
export const OgrSourceDatasetTimeType = {
  none: (): OgrSourceDatasetTimeTypeDict => ({ type: "none" }),
  start: (
    startField: string,
    startFormat: OgrSourceTimeFormatDict,
    duration: OgrSourceDurationDict,
  ): OgrSourceDatasetTimeTypeDict => ({ type: "start", startField, startFormat, duration }),
  startEnd: (
    startField: string,
    startFormat: OgrSourceTimeFormatDict,
    endField: string,
    endFormat: OgrSourceTimeFormatDict,
  ): OgrSourceDatasetTimeTypeDict => ({
    type: "start+end",
    startField,
    startFormat,
    endField,
    endFormat,
  }),
  startDuration: (
    startField: string,
    startFormat: OgrSourceTimeFormatDict,
    durationField: string,
  ): OgrSourceDatasetTimeTypeDict => ({
    type: "start+duration",
    startField,
    startFormat,
    durationField,
  }),
};

// ---------------------------------------------------------------------------
// Column and geometry typing
// ---------------------------------------------------------------------------

export type ColumnType = "float" | "int" | "text";

/**
 * Column type from the values of a column.
 *
 * Only-integer columns are "int", other numeric columns "float",
 * string (or all-null) columns "text".
 */
export function columnTypeOf(name: string, values: unknown[]): ColumnType {
  const present = values.filter((value) => value !== null && value !== undefined);
  if (present.every((value) => typeof value === "string")) return "text";
  if (present.every((value) => typeof value === "number")) {
    return present.every((value) => Number.isInteger(value)) ? "int" : "float";
  }
  throw new InputError(`Column "${name}" has no corresponding column type`);
}

export function vectorDataTypeOf(geometryType: string): VectorDataType {
  switch (geometryType) {
    case "Point":
    case "MultiPoint":
      return "MultiPoint";
    case "LineString":
    case "MultiLineString":
      return "MultiLineString";
    case "Polygon":
    case "MultiPolygon":
      return "MultiPolygon";
    default:
      throw new InputError(`Invalid vector data type: ${geometryType}`);
  }
}

// ---------------------------------------------------------------------------
// Upload
// ---------------------------------------------------------------------------

export interface UploadOptions {
  name?: string;
  time?: OgrSourceDatasetTimeTypeDict;
  onError?: OgrOnError;
}

/**
 * Upload a data frame and create a dataset from it.
 *
 * @returns The id of the created dataset
 */
export async function uploadDataframe(
  frame: GeoDataFrame,
  options: UploadOptions = {},
): Promise<InternalDatasetId> {
  if (frame.length === 0) {
    throw new InputError("Cannot upload empty dataframe");
  }
  if (!frame.crs) {
    throw new InputError("Dataframe must have a specified crs");
  }

  const first = frame.rows[0];
  if (!first?.geometry) {
    throw new InputError("Dataframe must have geometries");
  }
  const dataType = vectorDataTypeOf(first.geometry.type);

  const columns: Record<string, ColumnType> = {};
  for (const name of frame.columns) {
    columns[name] = columnTypeOf(name, frame.column(name));
  }
  const byType = (type: ColumnType) =>
    Object.keys(columns).filter((name) => columns[name] === type);

  const session = getSession();
  const client = new DatasetClient(session.clientConfig());

  const uploadId = await client.upload([
    {
      name: "geo.json",
      content: JSON.stringify(frame.toFeatureCollection()),
      contentType: "application/geo+json",
    },
  ]);
  session.logger?.debug(`[upload] Uploaded ${frame.length} feature(s) as ${uploadId}`);

  const request: CreateDatasetRequest = {
    upload: uploadId,
    definition: {
      properties: {
        name: options.name ?? "Upload from TypeScript",
        description: "",
        sourceOperator: "OgrSource",
      },
      metaData: {
        type: "OgrMetaData",
        loadingInfo: {
          fileName: "geo.json",
          layerName: "geo",
          dataType,
          time: options.time ?? OgrSourceDatasetTimeType.none(),
          columns: {
            x: "",
            float: byType("float"),
            int: byType("int"),
            text: byType("text"),
          },
          onError: options.onError ?? "abort",
        },
        resultDescriptor: {
          type: "vector",
          dataType,
          columns,
          spatialReference: frame.crs,
        },
      },
    },
  };

  const datasetId = InternalDatasetId.fromResponse(await client.create(request));
  session.logger?.debug(`[upload] Created dataset ${datasetId.toString()}`);
  return datasetId;
}
