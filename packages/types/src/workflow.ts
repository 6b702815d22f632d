/**
 * Workflow definitions and the responses of the workflow endpoints.
 */

import type { DatasetId } from "./dataset.js";

/** Workflow identifier (a UUID string) */
export type WorkflowId = string;

/**
 * An operator graph as the server stores it.
 *
 * Only the top level is fixed; operator parameters and sources are
 * operator-specific.
 */
export interface WorkflowDefinition {
  type: "Vector" | "Raster" | "Plot";
  operator: {
    type: string;
    params?: Record<string, unknown>;
    sources?: Record<string, unknown>;
  };
}

export interface RegisterWorkflowResponse {
  id: WorkflowId;
}

export interface Provenance {
  citation: string;
  license: string;
  uri: string;
}

export interface ProvenanceEntry {
  dataset: DatasetId;
  provenance: Provenance | null;
}

export interface PlotResponse {
  outputFormat: string;
  plotType: string;
  /** Vega output carries `{ vegaString, metadata }`, plain JSON output anything */
  data?: unknown;
}
