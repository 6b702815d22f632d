/**
 * Tabular view of vector features.
 *
 * Each row holds one feature's geometry, its properties and the time
 * interval it is valid for. The frame knows the CRS its geometries are in.
 */

import type { SpatialReference, WfsFeature, WfsFeatureCollection } from "@geoengine-ts/types";
import type { Feature, FeatureCollection, Geometry } from "geojson";

export interface GeoDataFrameRow {
  geometry: Geometry | null;
  properties: Record<string, unknown>;
  /** `null` when absent or unbounded */
  start: Date | null;
  end: Date | null;
}

export class GeoDataFrame {
  readonly rows: readonly GeoDataFrameRow[];
  readonly crs: SpatialReference | null;

  constructor(rows: GeoDataFrameRow[], crs: SpatialReference | null = null) {
    this.rows = [...rows];
    this.crs = crs;
  }

  /** Build from WFS output, reading each feature's `when` interval */
  static fromFeatureCollection(
    collection: WfsFeatureCollection | FeatureCollection,
    crs: SpatialReference | null = null,
  ): GeoDataFrame {
    const features: Array<WfsFeature | Feature> = collection.features;
    const rows = features.map((feature): GeoDataFrameRow => {
      const when: unknown = Reflect.get(feature, "when");
      return {
        geometry: feature.geometry,
        properties: { ...(feature.properties ?? {}) },
        start: parseTime(when, "start"),
        end: parseTime(when, "end"),
      };
    });
    return new GeoDataFrame(rows, crs);
  }

  get length(): number {
    return this.rows.length;
  }

  /** Property names in order of first appearance */
  get columns(): string[] {
    const seen = new Set<string>();
    for (const row of this.rows) {
      for (const key of Object.keys(row.properties)) seen.add(key);
    }
    return [...seen];
  }

  /** All values of one column, `null` where a row lacks it */
  column(name: string): unknown[] {
    return this.rows.map((row) => (Object.hasOwn(row.properties, name) ? row.properties[name] : null));
  }

  /** GeoJSON of the geometries and properties; time is not part of it */
  toFeatureCollection(): FeatureCollection {
    const features = this.rows.map(
      (row): Feature => ({
        type: "Feature",
        geometry: row.geometry ?? emptyGeometry(),
        properties: { ...row.properties },
      }),
    );
    return { type: "FeatureCollection", features };
  }
}

function parseTime(when: unknown, key: "start" | "end"): Date | null {
  if (typeof when !== "object" || when === null) return null;
  const value: unknown = Reflect.get(when, key);
  if (typeof value !== "string" && typeof value !== "number") return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function emptyGeometry(): Geometry {
  return { type: "GeometryCollection", geometries: [] };
}
