import type {
  BoundingBox2D,
  BoundsTuple,
  SpatialReference,
  SpatialResolution,
  TimeInterval,
} from "@geoengine-ts/types";
import { InputError } from "./errors.js";

export type TimeInput = Date | string;

export const DEFAULT_SRS: SpatialReference = "EPSG:4326";
export const DEFAULT_RESOLUTION: SpatialResolution = { x: 0.1, y: 0.1 };

/**
 * A spatio-temporal query: bounds, a time interval, a resolution and the
 * spatial reference the bounds are given in.
 *
 * @example
 * new QueryRectangle([-60, 5, 61, 80], ["2014-04-01T12:00:00Z", "2014-04-01T12:00:00Z"])
 */
export class QueryRectangle {
  readonly bbox: Readonly<BoundingBox2D>;
  readonly time: Readonly<TimeInterval>;
  readonly resolution: Readonly<SpatialResolution>;
  readonly srs: SpatialReference;

  constructor(
    bounds: BoundsTuple | BoundingBox2D,
    time: [TimeInput, TimeInput] | TimeInterval,
    resolution: SpatialResolution | [number, number] = DEFAULT_RESOLUTION,
    srs: SpatialReference = DEFAULT_SRS,
  ) {
    const bbox = Array.isArray(bounds)
      ? { xmin: bounds[0], ymin: bounds[1], xmax: bounds[2], ymax: bounds[3] }
      : { ...bounds };
    const [startInput, endInput] = Array.isArray(time) ? time : [time.start, time.end];
    const start = toDate(startInput);
    const end = toDate(endInput);
    const res = Array.isArray(resolution) ? { x: resolution[0], y: resolution[1] } : { ...resolution };

    if (start.getTime() > end.getTime()) {
      throw new InputError("Time interval: start must be <= end");
    }
    if (![bbox.xmin, bbox.ymin, bbox.xmax, bbox.ymax].every(Number.isFinite)) {
      throw new InputError("Bounding box: bounds must be finite numbers");
    }
    if (bbox.xmin > bbox.xmax || bbox.ymin > bbox.ymax) {
      throw new InputError("Bounding box: min must be <= max");
    }
    if (!Number.isFinite(res.x) || !Number.isFinite(res.y)) {
      throw new InputError("Resolution: must be a finite number");
    }
    if (res.x <= 0 || res.y <= 0) {
      throw new InputError("Resolution: must be positive");
    }

    this.bbox = Object.freeze(bbox);
    this.time = Object.freeze({ start, end });
    this.resolution = Object.freeze(res);
    this.srs = srs;
  }

  /** `xmin,ymin,xmax,ymax` */
  get bboxStr(): string {
    const { xmin, ymin, xmax, ymax } = this.bbox;
    return [xmin, ymin, xmax, ymax].join(",");
  }

  /** Bounds in OGC axis order: latitude first for EPSG:4326 */
  get bboxOgcStr(): string {
    if (this.srs !== "EPSG:4326") return this.bboxStr;
    const { xmin, ymin, xmax, ymax } = this.bbox;
    return [ymin, xmin, ymax, xmax].join(",");
  }

  /** A single instant when start equals end, otherwise `start/end` */
  get timeStr(): string {
    const start = this.time.start.toISOString();
    if (this.time.start.getTime() === this.time.end.getTime()) return start;
    return `${start}/${this.time.end.toISOString()}`;
  }

  /** `x,y` */
  get resolutionStr(): string {
    return `${this.resolution.x},${this.resolution.y}`;
  }

  toString(): string {
    return `QueryRectangle(${this.bboxStr} | ${this.timeStr} | ${this.resolutionStr} | ${this.srs})`;
  }
}

function toDate(input: TimeInput): Date {
  const date = typeof input === "string" ? new Date(input) : new Date(input.getTime());
  if (Number.isNaN(date.getTime())) {
    throw new InputError(`Invalid time: ${String(input)}`);
  }
  return date;
}
