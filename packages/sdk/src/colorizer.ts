import type { RgbaColor } from "@geoengine-ts/types";
import { InputError } from "./errors.js";

export interface Breakpoint {
  value: number;
  color: RgbaColor;
}

const TRANSPARENT: RgbaColor = [0, 0, 0, 0];

/**
 * Linear color gradient used to style raster workflows over WMS.
 */
export class Colorizer {
  readonly breakpoints: readonly Breakpoint[];
  readonly noDataColor: RgbaColor;
  readonly defaultColor: RgbaColor;

  constructor(
    breakpoints: Breakpoint[],
    noDataColor: RgbaColor = TRANSPARENT,
    defaultColor: RgbaColor = TRANSPARENT,
  ) {
    if (breakpoints.length === 0) {
      throw new InputError("Colorizer needs at least one breakpoint");
    }
    for (let i = 1; i < breakpoints.length; i++) {
      const previous = breakpoints[i - 1];
      const current = breakpoints[i];
      if (previous && current && previous.value > current.value) {
        throw new InputError("Colorizer breakpoints must be in ascending order");
      }
    }
    for (const color of [...breakpoints.map((b) => b.color), noDataColor, defaultColor]) {
      validateColor(color);
    }

    this.breakpoints = breakpoints.map((b): Breakpoint => ({ value: b.value, color: [...b.color] }));
    this.noDataColor = [...noDataColor];
    this.defaultColor = [...defaultColor];
  }

  /**
   * Spread colors evenly between `min` and `max`.
   *
   * The first color sits at `min`, the last at `max`.
   */
  static linearWithColors(
    min: number,
    max: number,
    colors: RgbaColor[],
    noDataColor: RgbaColor = TRANSPARENT,
    defaultColor: RgbaColor = TRANSPARENT,
  ): Colorizer {
    if (!(min < max)) {
      throw new InputError("Colorizer: min must be < max");
    }
    if (colors.length < 2) {
      throw new InputError("Colorizer: at least two colors are required");
    }
    const step = (max - min) / (colors.length - 1);
    const breakpoints = colors.map((color, i) => ({
      value: i === colors.length - 1 ? max : min + i * step,
      color,
    }));
    return new Colorizer(breakpoints, noDataColor, defaultColor);
  }

  toJson(): string {
    return JSON.stringify({
      type: "linearGradient",
      breakpoints: this.breakpoints,
      noDataColor: this.noDataColor,
      defaultColor: this.defaultColor,
    });
  }

  /** WMS `styles` value */
  toStyle(): string {
    return `custom:${this.toJson()}`;
  }
}

function validateColor(color: RgbaColor): void {
  const valid = color.every((channel) => Number.isInteger(channel) && channel >= 0 && channel <= 255);
  if (!valid) {
    throw new InputError(`Invalid color [${color.join(", ")}]: channels must be integers in 0-255`);
  }
}
