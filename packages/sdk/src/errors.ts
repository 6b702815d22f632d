/**
 * Errors raised by the library itself, before or after talking to the server.
 *
 * Server-side failures surface as `GeoEngineError` from clients-core.
 */

export { GeoEngineError } from "@geoengine-ts/clients-core";

/** Invalid arguments, e.g. an inverted bounding box */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

/** No session: `initialize()` was never called or `reset()` cleared it */
export class UninitializedError extends Error {
  constructor() {
    super("You have to call `initialize` before using other functionality");
    this.name = "UninitializedError";
  }
}

/** A response of an unexpected result type */
export class ResultTypeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResultTypeError";
  }
}

export class MethodNotCalledOnVectorError extends Error {
  constructor() {
    super("Only allowed for vector workflows");
    this.name = "MethodNotCalledOnVectorError";
  }
}

export class MethodNotCalledOnRasterError extends Error {
  constructor() {
    super("Only allowed for raster workflows");
    this.name = "MethodNotCalledOnRasterError";
  }
}

export class MethodNotCalledOnPlotError extends Error {
  constructor() {
    super("Only allowed for plot workflows");
    this.name = "MethodNotCalledOnPlotError";
  }
}

export class SpatialReferenceMismatchError extends Error {
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string) {
    super(`Spatial reference mismatch: workflow is in ${expected}, query is in ${actual}`);
    this.name = "SpatialReferenceMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}
