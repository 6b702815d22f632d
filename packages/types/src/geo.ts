/**
 * Geographic utility types.
 */

/** Axis-aligned bounding box in the coordinates of a spatial reference system */
export interface BoundingBox2D {
  xmin: number;
  ymin: number;
  xmax: number;
  ymax: number;
}

/** Bounds as `[xmin, ymin, xmax, ymax]` */
export type BoundsTuple = [number, number, number, number];

/** Size of one pixel/cell in the units of the spatial reference system */
export interface SpatialResolution {
  x: number;
  y: number;
}

/** Spatial reference identifier such as "EPSG:4326" */
export type SpatialReference = string;

/** RGBA color, each channel an integer in 0-255 */
export type RgbaColor = [number, number, number, number];
