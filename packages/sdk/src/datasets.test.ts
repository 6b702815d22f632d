import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { GeoEngineError, silentLogger } from "@geoengine-ts/clients-core";
import { createStubServer, type StubRequest } from "@geoengine-ts/clients-core/testing";
import { initialize, reset } from "./auth.js";
import {
  InternalDatasetId,
  OgrSourceDatasetTimeType,
  OgrSourceDuration,
  OgrSourceTimeFormat,
  columnTypeOf,
  uploadDataframe,
  vectorDataTypeOf,
} from "./datasets.js";
import { InputError } from "./errors.js";
import { GeoDataFrame, type GeoDataFrameRow } from "./geoDataFrame.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function point(x: number, y: number, properties: Record<string, unknown>): GeoDataFrameRow {
  return { geometry: { type: "Point", coordinates: [x, y] }, properties, start: null, end: null };
}

function uploadServer() {
  return createStubServer((request: StubRequest) => {
    switch (`${request.method} ${request.url}`) {
      case "POST /anonymous":
        return { data: { id: "test-session" } };
      case "POST /upload":
        return { data: { id: "upload-1" } };
      case "POST /dataset":
        return { data: { id: { type: "internal", datasetId: "ds-1" } } };
      default:
        return { status: 404, statusText: "Not Found" };
    }
  });
}

beforeEach(() => {
  vi.stubEnv("GEOENGINE_EMAIL", "");
  vi.stubEnv("GEOENGINE_PASSWORD", "");
  vi.stubEnv("GEOENGINE_TOKEN", "");
});

afterEach(async () => {
  await reset(false);
  vi.unstubAllEnvs();
});

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("columnTypeOf", () => {
  it("maps values to column types", () => {
    expect(columnTypeOf("a", [1, 2, null])).toBe("int");
    expect(columnTypeOf("a", [1, 2.5])).toBe("float");
    expect(columnTypeOf("a", ["x", null])).toBe("text");
    expect(columnTypeOf("a", [null, null])).toBe("text");
  });

  it("rejects mixed or unsupported values", () => {
    expect(() => columnTypeOf("mixed", [1, "x"])).toThrow(
      'Column "mixed" has no corresponding column type',
    );
    expect(() => columnTypeOf("flag", [true])).toThrow(InputError);
  });
});

describe("vectorDataTypeOf", () => {
  it("maps geometry types to their multi variant", () => {
    expect(vectorDataTypeOf("Point")).toBe("MultiPoint");
    expect(vectorDataTypeOf("MultiLineString")).toBe("MultiLineString");
    expect(vectorDataTypeOf("Polygon")).toBe("MultiPolygon");
  });

  it("rejects other geometry types", () => {
    expect(() => vectorDataTypeOf("GeometryCollection")).toThrow(
      "Invalid vector data type: GeometryCollection",
    );
  });
});

describe("time specification", () => {
  it("builds start+duration and start+end specs", () => {
    expect(
      OgrSourceDatasetTimeType.start(
        "time",
        OgrSourceTimeFormat.auto(),
        OgrSourceDuration.value({ granularity: "Days", step: 1 }),
      ),
    ).toEqual({
      type: "start",
      startField: "time",
      startFormat: { format: "auto" },
      duration: { type: "value", granularity: "Days", step: 1 },
    });
    expect(
      OgrSourceDatasetTimeType.startEnd(
        "from",
        OgrSourceTimeFormat.custom("%Y-%m-%d"),
        "to",
        OgrSourceTimeFormat.seconds(),
      ),
    ).toEqual({
      type: "start+end",
      startField: "from",
      startFormat: { format: "custom", customFormat: "%Y-%m-%d" },
      endField: "to",
      endFormat: { format: "seconds" },
    });
  });
});

describe("InternalDatasetId", () => {
  it("reads internal ids", () => {
    const id = InternalDatasetId.fromResponse({ type: "internal", datasetId: "ds-1" });
    expect(id.toString()).toBe("ds-1");
    expect(id.equals(new InternalDatasetId("ds-1"))).toBe(true);
    expect(id.toDict()).toEqual({ type: "internal", datasetId: "ds-1" });
  });

  it("rejects external ids", () => {
    expect(() =>
      InternalDatasetId.fromResponse({ type: "external", providerId: "p", datasetId: "d" }),
    ).toThrow(GeoEngineError);
  });
});

describe("uploadDataframe", () => {
  it("uploads GeoJSON and creates an OGR dataset", async () => {
    const server = uploadServer();
    await initialize("http://localhost:3030/api", {
      adapter: server.adapter,
      logger: silentLogger,
      dotenv: false,
    });
    const frame = new GeoDataFrame(
      [
        point(1, 2, { name: "a", count: 1, score: 1.5 }),
        point(3, 4, { name: "b", count: 2, score: 2 }),
      ],
      "EPSG:4326",
    );

    const id = await uploadDataframe(frame);

    expect(id.toString()).toBe("ds-1");

    const upload = server.requests[1];
    expect(upload?.url).toBe("/upload");
    const form = upload?.body instanceof FormData ? upload.body : new FormData();
    const file = form.get("geo.json");
    const text = file instanceof Blob ? await file.text() : "";
    expect(JSON.parse(text)).toEqual({
      type: "FeatureCollection",
      features: [
        {
          type: "Feature",
          geometry: { type: "Point", coordinates: [1, 2] },
          properties: { name: "a", count: 1, score: 1.5 },
        },
        {
          type: "Feature",
          geometry: { type: "Point", coordinates: [3, 4] },
          properties: { name: "b", count: 2, score: 2 },
        },
      ],
    });

    expect(server.requests[2]).toMatchObject({ method: "POST", url: "/dataset" });
    expect(server.requests[2]?.body).toEqual({
      upload: "upload-1",
      definition: {
        properties: {
          name: "Upload from TypeScript",
          description: "",
          sourceOperator: "OgrSource",
        },
        metaData: {
          type: "OgrMetaData",
          loadingInfo: {
            fileName: "geo.json",
            layerName: "geo",
            dataType: "MultiPoint",
            time: { type: "none" },
            columns: { x: "", float: ["score"], int: ["count"], text: ["name"] },
            onError: "abort",
          },
          resultDescriptor: {
            type: "vector",
            dataType: "MultiPoint",
            columns: { name: "text", count: "int", score: "float" },
            spatialReference: "EPSG:4326",
          },
        },
      },
    });
  });

  it("types a column named like an Object member", async () => {
    const server = uploadServer();
    await initialize("http://localhost:3030/api", {
      adapter: server.adapter,
      logger: silentLogger,
      dotenv: false,
    });
    const frame = new GeoDataFrame(
      [point(1, 2, { constructor: "a" }), point(3, 4, {})],
      "EPSG:4326",
    );

    await uploadDataframe(frame);

    expect(server.requests[2]?.body).toMatchObject({
      definition: {
        metaData: {
          loadingInfo: { columns: { x: "", float: [], int: [], text: ["constructor"] } },
          resultDescriptor: { columns: { constructor: "text" } },
        },
      },
    });
  });

  it("validates the data frame before uploading", async () => {
    const server = uploadServer();
    await initialize("http://localhost:3030/api", {
      adapter: server.adapter,
      logger: silentLogger,
      dotenv: false,
    });

    await expect(uploadDataframe(new GeoDataFrame([], "EPSG:4326"))).rejects.toThrow(
      "Cannot upload empty dataframe",
    );
    await expect(uploadDataframe(new GeoDataFrame([point(0, 0, {})]))).rejects.toThrow(
      "Dataframe must have a specified crs",
    );
    await expect(
      uploadDataframe(
        new GeoDataFrame([{ geometry: null, properties: {}, start: null, end: null }], "EPSG:4326"),
      ),
    ).rejects.toThrow("Dataframe must have geometries");
    expect(server.requests.map((r) => r.url)).toEqual(["/anonymous"]);
  });
});
