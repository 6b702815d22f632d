/**
 * Result descriptors with a readable display form.
 */

import type {
  Measurement,
  PlotResultDescriptorResponse,
  RasterDataType,
  RasterResultDescriptorResponse,
  ResultDescriptorResponse,
  ResultType,
  SpatialReference,
  VectorColumnType,
  VectorDataType,
  VectorResultDescriptorResponse,
} from "@geoengine-ts/types";

abstract class BaseResultDescriptor {
  abstract readonly type: ResultType;

  isVector(): this is VectorResultDescriptor {
    return this.type === "vector";
  }

  isRaster(): this is RasterResultDescriptor {
    return this.type === "raster";
  }

  isPlot(): this is PlotResultDescriptor {
    return this.type === "plot";
  }
}

export class VectorResultDescriptor extends BaseResultDescriptor {
  readonly type = "vector";
  readonly dataType: VectorDataType;
  readonly spatialReference: SpatialReference;
  readonly columns: Readonly<Record<string, VectorColumnType>>;

  constructor(response: VectorResultDescriptorResponse) {
    super();
    this.dataType = response.dataType;
    this.spatialReference = response.spatialReference;
    this.columns = { ...response.columns };
  }

  toString(): string {
    let r = "";
    r += `Data type:         ${this.dataType}\n`;
    r += `Spatial Reference: ${this.spatialReference}\n`;
    r += "Columns:\n";
    for (const [name, columnType] of Object.entries(this.columns)) {
      r += `  ${name}: ${columnType}\n`;
    }
    return r;
  }
}

export class RasterResultDescriptor extends BaseResultDescriptor {
  readonly type = "raster";
  readonly dataType: RasterDataType;
  readonly spatialReference: SpatialReference;
  readonly measurement: Measurement;
  readonly noDataValue: number | null;

  constructor(response: RasterResultDescriptorResponse) {
    super();
    this.dataType = response.dataType;
    this.spatialReference = response.spatialReference;
    this.measurement = response.measurement;
    this.noDataValue = response.noDataValue ?? null;
  }

  toString(): string {
    let r = "";
    r += `Data type:         ${this.dataType}\n`;
    r += `Spatial Reference: ${this.spatialReference}\n`;
    r += `Measurement:       ${describeMeasurement(this.measurement)}\n`;
    if (this.noDataValue !== null) {
      r += `No Data Value:     ${this.noDataValue}\n`;
    }
    return r;
  }
}

export class PlotResultDescriptor extends BaseResultDescriptor {
  readonly type = "plot";
  readonly spatialReference: SpatialReference | null;

  constructor(response: PlotResultDescriptorResponse) {
    super();
    this.spatialReference = response.spatialReference ?? null;
  }

  toString(): string {
    return "Plot Result\n";
  }
}

export type ResultDescriptor =
  | VectorResultDescriptor
  | RasterResultDescriptor
  | PlotResultDescriptor;

export function resultDescriptorFromResponse(response: ResultDescriptorResponse): ResultDescriptor {
  switch (response.type) {
    case "vector":
      return new VectorResultDescriptor(response);
    case "raster":
      return new RasterResultDescriptor(response);
    case "plot":
      return new PlotResultDescriptor(response);
  }
}

function describeMeasurement(measurement: Measurement): string {
  switch (measurement.type) {
    case "unitless":
      return "unitless";
    case "continuous":
      return measurement.unit
        ? `${measurement.measurement} (${measurement.unit})`
        : measurement.measurement;
    case "classification": {
      const classes = Object.entries(measurement.classes)
        .map(([key, label]) => `${key}=${label}`)
        .join(", ");
      return `${measurement.measurement} [${classes}]`;
    }
  }
}
