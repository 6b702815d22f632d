/**
 * Workflows: server-side operator graphs and the results they compute.
 */

import { OgcClient, PlotClient, WorkflowClient, type WmsRequest } from "@geoengine-ts/clients-core";
import type { ProvenanceEntry, WorkflowDefinition, WorkflowId } from "@geoengine-ts/types";
import { getSession, type Session } from "./auth.js";
import type { Colorizer } from "./colorizer.js";
import {
  MethodNotCalledOnPlotError,
  MethodNotCalledOnRasterError,
  MethodNotCalledOnVectorError,
  ResultTypeError,
  SpatialReferenceMismatchError,
} from "./errors.js";
import { GeoDataFrame } from "./geoDataFrame.js";
import type { QueryRectangle } from "./queryRectangle.js";
import { resultDescriptorFromResponse, type ResultDescriptor } from "./resultDescriptor.js";

export interface PlotChart {
  plotType: string;
  outputFormat: string;
  /** The Vega specification for "JsonVega" output, the raw data otherwise */
  data: unknown;
}

export class Workflow {
  readonly id: WorkflowId;
  private descriptor: ResultDescriptor;
  private readonly session: Session;

  private constructor(id: WorkflowId, descriptor: ResultDescriptor, session: Session) {
    this.id = id;
    this.descriptor = descriptor;
    this.session = session;
  }

  /** Resolve an id; fails for ids the server does not know */
  static async fromId(id: WorkflowId, session: Session = getSession()): Promise<Workflow> {
    const descriptor = await fetchResultDescriptor(id, session);
    return new Workflow(id, descriptor, session);
  }

  toString(): string {
    return this.id;
  }

  /** Fetch the result descriptor from the server */
  async getResultDescriptor(): Promise<ResultDescriptor> {
    this.descriptor = await fetchResultDescriptor(this.id, this.session);
    return this.descriptor;
  }

  async workflowDefinition(): Promise<WorkflowDefinition> {
    return new WorkflowClient(this.session.clientConfig()).getDefinition(this.id);
  }

  async getProvenance(): Promise<ProvenanceEntry[]> {
    return new WorkflowClient(this.session.clientConfig()).getProvenance(this.id);
  }

  /** Query vector output as a data frame */
  async getDataframe(query: QueryRectangle): Promise<GeoDataFrame> {
    const descriptor = this.descriptor;
    if (!descriptor.isVector()) {
      throw new MethodNotCalledOnVectorError();
    }
    checkSpatialReference(descriptor.spatialReference, query.srs);

    const collection = await new OgcClient(this.session.clientConfig()).getFeatures(this.id, {
      bbox: query.bboxStr,
      time: query.timeStr,
      srsName: query.srs,
      queryResolution: query.resolutionStr,
    });
    return GeoDataFrame.fromFeatureCollection(collection, query.srs);
  }

  /** Render raster output to a PNG image */
  async wmsGetMap(query: QueryRectangle, colorizer?: Colorizer): Promise<Uint8Array> {
    const request = this.wmsRequest(query, colorizer);
    return new OgcClient(this.session.clientConfig()).getMap(this.id, request);
  }

  /** GetMap URL of the raster output; the session token must be sent separately */
  wmsUrl(query: QueryRectangle, colorizer?: Colorizer): string {
    const request = this.wmsRequest(query, colorizer);
    return new OgcClient(this.session.clientConfig()).getMapUrl(this.id, request);
  }

  /** Compute plot output; Vega output is parsed into its specification */
  async plotChart(query: QueryRectangle): Promise<PlotChart> {
    if (!this.descriptor.isPlot()) {
      throw new MethodNotCalledOnPlotError();
    }

    const plot = await new PlotClient(this.session.clientConfig()).getPlot(this.id, {
      bbox: query.bboxStr,
      crs: query.srs,
      time: query.timeStr,
      spatialResolution: query.resolutionStr,
    });

    if (plot.outputFormat !== "JsonVega") {
      return { plotType: plot.plotType, outputFormat: plot.outputFormat, data: plot.data };
    }
    return {
      plotType: plot.plotType,
      outputFormat: plot.outputFormat,
      data: parseVega(plot.data),
    };
  }

  private wmsRequest(query: QueryRectangle, colorizer?: Colorizer): WmsRequest {
    const descriptor = this.descriptor;
    if (!descriptor.isRaster()) {
      throw new MethodNotCalledOnRasterError();
    }
    checkSpatialReference(descriptor.spatialReference, query.srs);

    const { xmin, ymin, xmax, ymax } = query.bbox;
    return {
      bbox: query.bboxOgcStr,
      width: Math.trunc((xmax - xmin) / query.resolution.x),
      height: Math.trunc((ymax - ymin) / query.resolution.y),
      crs: query.srs,
      time: query.timeStr,
      styles: colorizer?.toStyle(),
    };
  }
}

/** Look up a workflow by its id */
export async function workflowById(id: WorkflowId): Promise<Workflow> {
  return Workflow.fromId(id);
}

/** Register a workflow definition and return the stored workflow */
export async function registerWorkflow(definition: WorkflowDefinition): Promise<Workflow> {
  const session = getSession();
  const id = await new WorkflowClient(session.clientConfig()).register(definition);
  return Workflow.fromId(id, session);
}

async function fetchResultDescriptor(id: WorkflowId, session: Session): Promise<ResultDescriptor> {
  const response = await new WorkflowClient(session.clientConfig()).getMetadata(id);
  return resultDescriptorFromResponse(response);
}

function checkSpatialReference(expected: string, actual: string): void {
  if (expected !== actual) {
    throw new SpatialReferenceMismatchError(expected, actual);
  }
}

function parseVega(data: unknown): unknown {
  const vegaString: unknown =
    typeof data === "object" && data !== null ? Reflect.get(data, "vegaString") : undefined;
  if (typeof vegaString !== "string") {
    throw new ResultTypeError("Vega plot output without a vegaString");
  }
  try {
    return JSON.parse(vegaString);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ResultTypeError(`Vega plot output is not valid JSON (${reason})`);
  }
}
