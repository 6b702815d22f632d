import type { PlotResponse, WorkflowId } from "@geoengine-ts/types";
import { BaseClient, type ClientConfig } from "./baseClient.js";
import { parseResponse, plotSchema } from "./schemas.js";

export interface PlotRequest {
  /** `xmin,ymin,xmax,ymax` */
  bbox: string;
  crs: string;
  time: string;
  /** `x,y` */
  spatialResolution: string;
}

export class PlotClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("plot", config);
  }

  /** Compute a plot workflow for a query rectangle */
  public async getPlot(id: WorkflowId, request: PlotRequest): Promise<PlotResponse> {
    const body = await this.client.get<unknown>({
      path: encodeURIComponent(id),
      query: { ...request },
    });
    return parseResponse(plotSchema, body, "plot");
  }
}
