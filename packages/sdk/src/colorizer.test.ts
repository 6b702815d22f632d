import { describe, it, expect } from "vitest";
import { Colorizer } from "./colorizer.js";
import { InputError } from "./errors.js";

describe("Colorizer", () => {
  it("spreads colors evenly between min and max", () => {
    const colorizer = Colorizer.linearWithColors(0, 100, [
      [0, 0, 0, 255],
      [128, 128, 128, 255],
      [255, 255, 255, 255],
    ]);

    expect(colorizer.breakpoints).toEqual([
      { value: 0, color: [0, 0, 0, 255] },
      { value: 50, color: [128, 128, 128, 255] },
      { value: 100, color: [255, 255, 255, 255] },
    ]);
  });

  it("serializes to the linear gradient JSON", () => {
    const colorizer = new Colorizer(
      [
        { value: 0, color: [0, 0, 255, 255] },
        { value: 1, color: [255, 0, 0, 255] },
      ],
      [0, 0, 0, 0],
      [255, 255, 255, 0],
    );

    expect(colorizer.toJson()).toBe(
      '{"type":"linearGradient","breakpoints":[{"value":0,"color":[0,0,255,255]},' +
        '{"value":1,"color":[255,0,0,255]}],"noDataColor":[0,0,0,0],"defaultColor":[255,255,255,0]}',
    );
  });

  it("prefixes the WMS style with custom:", () => {
    const colorizer = new Colorizer([{ value: 0, color: [1, 2, 3, 4] }]);
    expect(colorizer.toStyle()).toBe(
      'custom:{"type":"linearGradient","breakpoints":[{"value":0,"color":[1,2,3,4]}],' +
        '"noDataColor":[0,0,0,0],"defaultColor":[0,0,0,0]}',
    );
  });

  it("rejects out-of-range channels", () => {
    expect(() => new Colorizer([{ value: 0, color: [256, 0, 0, 255] }])).toThrow(InputError);
    expect(() => new Colorizer([{ value: 0, color: [0.5, 0, 0, 255] }])).toThrow(InputError);
  });

  it("rejects descending breakpoints", () => {
    expect(
      () =>
        new Colorizer([
          { value: 1, color: [0, 0, 0, 255] },
          { value: 0, color: [0, 0, 0, 255] },
        ]),
    ).toThrow(new InputError("Colorizer breakpoints must be in ascending order"));
  });

  it("needs two colors and an increasing range", () => {
    expect(() => Colorizer.linearWithColors(0, 1, [[0, 0, 0, 255]])).toThrow(InputError);
    expect(() =>
      Colorizer.linearWithColors(1, 1, [
        [0, 0, 0, 255],
        [1, 1, 1, 255],
      ]),
    ).toThrow(new InputError("Colorizer: min must be < max"));
  });
});
