/**
 * zod schemas for every JSON response the clients read.
 *
 * Schemas are typed against the shared response interfaces so the two
 * cannot drift apart.
 */

import { z } from "zod";
import type {
  CreateDatasetResponse,
  DatasetId,
  Measurement,
  PlotResponse,
  ProvenanceEntry,
  RegisterWorkflowResponse,
  ResultDescriptorResponse,
  SessionResponse,
  UploadResponse,
  WorkflowDefinition,
} from "@geoengine-ts/types";
import { GeoEngineError } from "./errors.js";

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

export const sessionSchema: z.ZodType<SessionResponse> = z.object({
  id: z.string(),
  created: z.string().optional(),
  validUntil: z.string().optional(),
  user: z
    .object({
      id: z.string(),
      email: z.string().optional(),
      realName: z.string().optional(),
    })
    .nullable()
    .optional(),
});

// ---------------------------------------------------------------------------
// Result descriptors
// ---------------------------------------------------------------------------

const measurementSchema: z.ZodType<Measurement> = z.discriminatedUnion("type", [
  z.object({ type: z.literal("unitless") }),
  z.object({
    type: z.literal("continuous"),
    measurement: z.string(),
    unit: z.string().nullable().optional(),
  }),
  z.object({
    type: z.literal("classification"),
    measurement: z.string(),
    classes: z.record(z.string()),
  }),
]);

export const resultDescriptorSchema: z.ZodType<ResultDescriptorResponse> = z.discriminatedUnion(
  "type",
  [
    z.object({
      type: z.literal("vector"),
      dataType: z.enum(["Data", "MultiPoint", "MultiLineString", "MultiPolygon"]),
      spatialReference: z.string(),
      columns: z.record(z.string()),
    }),
    z.object({
      type: z.literal("raster"),
      dataType: z.enum(["U8", "U16", "U32", "U64", "I8", "I16", "I32", "I64", "F32", "F64"]),
      spatialReference: z.string(),
      measurement: measurementSchema,
      noDataValue: z.number().nullable().optional(),
    }),
    z.object({
      type: z.literal("plot"),
      spatialReference: z.string().nullable().optional(),
    }),
  ],
);

// ---------------------------------------------------------------------------
// Workflows
// ---------------------------------------------------------------------------

export const registerWorkflowSchema: z.ZodType<RegisterWorkflowResponse> = z.object({
  id: z.string(),
});

export const workflowDefinitionSchema: z.ZodType<WorkflowDefinition> = z.object({
  type: z.enum(["Vector", "Raster", "Plot"]),
  operator: z
    .object({
      type: z.string(),
      params: z.record(z.unknown()).optional(),
      sources: z.record(z.unknown()).optional(),
    })
    .passthrough(),
});

const datasetIdSchema: z.ZodType<DatasetId> = z.discriminatedUnion("type", [
  z.object({ type: z.literal("internal"), datasetId: z.string() }),
  z.object({ type: z.literal("external"), providerId: z.string(), datasetId: z.string() }),
]);

export const provenanceSchema: z.ZodType<ProvenanceEntry[]> = z.array(
  z.object({
    dataset: datasetIdSchema,
    provenance: z
      .object({
        citation: z.string(),
        license: z.string(),
        uri: z.string(),
      })
      .nullable(),
  }),
);

export const plotSchema: z.ZodType<PlotResponse> = z.object({
  outputFormat: z.string(),
  plotType: z.string(),
  data: z.unknown(),
});

// ---------------------------------------------------------------------------
// Datasets
// ---------------------------------------------------------------------------

export const uploadSchema: z.ZodType<UploadResponse> = z.object({
  id: z.string(),
});

export const createDatasetSchema: z.ZodType<CreateDatasetResponse> = z.object({
  id: datasetIdSchema,
});

/**
 * Validate a response body.
 *
 * @param what - Name of the response, used in the error message
 * @throws GeoEngineError with error "UnexpectedResponse" on mismatch
 */
export function parseResponse<T>(schema: z.ZodType<T>, body: unknown, what: string): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new GeoEngineError({
      error: "UnexpectedResponse",
      message: `Invalid ${what} response (${issues})`,
    });
  }
  return result.data;
}
