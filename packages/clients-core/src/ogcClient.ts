/**
 * OGC endpoints of a workflow: WFS for vector features, WMS for raster images.
 */

import type { WfsFeatureCollection, WorkflowId } from "@geoengine-ts/types";
import type { Geometry } from "geojson";
import { z } from "zod";
import { BaseClient, type ClientConfig } from "./baseClient.js";
import { parseResponse } from "./schemas.js";

export interface WfsRequest {
  /** `xmin,ymin,xmax,ymax` */
  bbox: string;
  time: string;
  srsName: string;
  /** `x,y` */
  queryResolution: string;
}

export interface WmsRequest {
  /** Bounds in the axis order of `crs` */
  bbox: string;
  width: number;
  height: number;
  crs: string;
  time: string;
  /** e.g. `custom:{...}` for a colorizer; empty for the default style */
  styles?: string;
}

const geometrySchema = z.custom<Geometry | null>(
  (value) =>
    value === null ||
    (typeof value === "object" && typeof Reflect.get(value, "type") === "string"),
  { message: "Expected a GeoJSON geometry" },
);

const featureCollectionSchema: z.ZodType<WfsFeatureCollection> = z.object({
  type: z.literal("FeatureCollection"),
  features: z.array(
    z.object({
      type: z.literal("Feature"),
      id: z.union([z.string(), z.number()]).optional(),
      geometry: geometrySchema,
      properties: z.record(z.unknown()).nullable(),
      when: z
        .object({
          start: z.string(),
          end: z.string(),
          type: z.string().optional(),
        })
        .optional(),
    }),
  ),
});

export function wfsQuery(id: WorkflowId, request: WfsRequest): Record<string, string> {
  return {
    service: "WFS",
    version: "2.0.0",
    request: "GetFeature",
    outputFormat: "application/json",
    typeNames: `registry:${id}`,
    bbox: request.bbox,
    time: request.time,
    srsName: request.srsName,
    queryResolution: request.queryResolution,
  };
}

export function wmsQuery(id: WorkflowId, request: WmsRequest): Record<string, string> {
  return {
    service: "WMS",
    version: "1.3.0",
    request: "GetMap",
    layers: id,
    bbox: request.bbox,
    width: String(request.width),
    height: String(request.height),
    crs: request.crs,
    styles: request.styles ?? "",
    time: request.time,
    format: "image/png",
  };
}

export class OgcClient {
  private baseUrl: string;
  private wfs: BaseClient;
  private wms: BaseClient;

  constructor(config: ClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.wfs = new BaseClient("wfs", config);
    this.wms = new BaseClient("wms", config);
  }

  /** Fetch vector features of a workflow as GeoJSON */
  public async getFeatures(id: WorkflowId, request: WfsRequest): Promise<WfsFeatureCollection> {
    const body = await this.wfs.get<unknown>({
      path: encodeURIComponent(id),
      query: wfsQuery(id, request),
    });
    return parseResponse(featureCollectionSchema, body, "WFS GetFeature");
  }

  /** Render a raster workflow to PNG */
  public async getMap(id: WorkflowId, request: WmsRequest): Promise<Uint8Array> {
    const body = await this.wms.get<ArrayBuffer | Uint8Array>({
      path: encodeURIComponent(id),
      query: wmsQuery(id, request),
      headers: { Accept: "image/png" },
      responseType: "arraybuffer",
    });
    return body instanceof Uint8Array ? body : new Uint8Array(body);
  }

  /** The GetMap URL, e.g. for a map widget; carries no credentials */
  public getMapUrl(id: WorkflowId, request: WmsRequest): string {
    const search = new URLSearchParams(wmsQuery(id, request));
    return `${this.baseUrl}/wms/${encodeURIComponent(id)}?${search.toString()}`;
  }
}
