/**
 * GeoJSON as served by the WFS endpoint.
 *
 * Features carry their validity as a non-standard `when` member.
 */

import type { Geometry } from "geojson";

export interface FeatureTime {
  start: string;
  end: string;
  type?: string;
}

export interface WfsFeature {
  type: "Feature";
  id?: string | number;
  geometry: Geometry | null;
  properties: Record<string, unknown> | null;
  when?: FeatureTime;
}

export interface WfsFeatureCollection {
  type: "FeatureCollection";
  features: WfsFeature[];
}
