import { describe, expect, it } from "vitest";
import { Circle } from "../src/components/circle.js";
import { ConfigError } from "../src/errors.js";

describe("Circle", () => {
  it("applies defaults", () => {
    const circle = new Circle();
    expect(circle.config).toEqual({ cx: 50, cy: 50, r: 50 });
    expect(circle.toElement()).toBe('<circle cx="50" cy="50" r="50"/>');
  });

  it("reports center and bounding box in local space", () => {
    const circle = new Circle({ cx: 10, cy: 20, r: 5 });
    expect(circle.boundingBox()).toEqual({
      ok: true,
      value: { minX: 5, minY: 15, maxX: 15, maxY: 25 },
    });
    expect(circle.centralPoint()).toEqual({ ok: true, value: { x: 10, y: 20 } });
  });

  it("ignores the transform stack in geometry queries", () => {
    const circle = new Circle({ cx: 10, cy: 20, r: 5 }).translate(100, 100).scale(3);
    expect(circle.boundingBox()).toEqual({
      ok: true,
      value: { minX: 5, minY: 15, maxX: 15, maxY: 25 },
    });
    expect(circle.centralPoint()).toEqual({ ok: true, value: { x: 10, y: 20 } });
  });

  it("computes area and circumference", () => {
    const circle = new Circle({ r: 2 });
    expect(circle.area()).toBeCloseTo(4 * Math.PI, 10);
    expect(circle.circumference()).toBeCloseTo(4 * Math.PI, 10);
  });

  it("serializes geometry, then appearance, then transform", () => {
    const circle = new Circle(
      { cx: 50, cy: 50, r: 40 },
      { fill: "lightblue", stroke: "navy", strokeWidth: 3 },
    ).translate(80, 60);
    expect(circle.toElement()).toBe(
      '<circle cx="50" cy="50" r="40" fill="lightblue" stroke="navy" stroke-width="3" transform="translate(80,60)"/>',
    );
  });

  it("accepts a zero radius", () => {
    expect(new Circle({ r: 0 }).boundingBox()).toEqual({
      ok: true,
      value: { minX: 50, minY: 50, maxX: 50, maxY: 50 },
    });
  });

  it("rejects a negative radius at construction", () => {
    expect(() => new Circle({ r: -1 })).toThrow(ConfigError);
    expect(() => new Circle({ r: -1 })).toThrow("Invalid circle config");
  });

  it("rejects non-finite coordinates", () => {
    expect(() => new Circle({ cx: Number.NaN })).toThrow(ConfigError);
  });

  it("scales to fit a 60x60 box with scale(0.6)", () => {
    const circle = new Circle({ r: 50 }).restrictSize(60, 60);
    expect(circle.transformString()).toBe("scale(0.6)");
    expect(circle.config).toEqual({ cx: 50, cy: 50, r: 50 });
    expect(circle.toElement()).toBe('<circle cx="50" cy="50" r="50" transform="scale(0.6)"/>');
  });
});
