import { describe, expect, it } from "vitest";
import { Circle } from "../src/components/circle.js";
import { Polyline } from "../src/components/polyline.js";
import { Rectangle } from "../src/components/rectangle.js";
import { ConfigError } from "../src/errors.js";
import { mergeAttributes } from "../src/format.js";
import { applyMatrix } from "../src/transform/matrix.js";
import { boxSize } from "../src/types/geometry.js";

function transformedSize(component: Rectangle | Circle | Polyline) {
  const box = component.transformedBoundingBox();
  if (!box.ok) throw new Error("expected a determinate box");
  return boxSize(box.value);
}

describe("chainable transforms", () => {
  it("return the same instance", () => {
    const circle = new Circle();
    expect(circle.translate(1, 2)).toBe(circle);
    expect(circle.scale(2)).toBe(circle);
    expect(circle.rotate(15)).toBe(circle);
    expect(circle.restrictSize(1000, 1000)).toBe(circle);
  });

  it("serialize in the order they were applied", () => {
    const circle = new Circle({ r: 10 }).translate(5, 5).scale(2);
    expect(circle.transformString()).toBe("translate(5,5) scale(2)");
    expect(circle.hasTransform()).toBe(true);
  });

  it("can be seeded at construction", () => {
    const rect = new Rectangle({ width: 10, height: 10 }, {}, [{ kind: "rotate", angle: 30 }]);
    expect(rect.transformString()).toBe("rotate(30)");
    rect.translate(1, 0);
    expect(rect.transforms).toHaveLength(2);
  });
});

describe("toElement", () => {
  it("is repeatable and does not mutate the component", () => {
    const rect = new Rectangle({ width: 10, height: 10 }).translate(1, 1);
    const first = rect.toElement();
    expect(rect.toElement()).toBe(first);
    expect(rect.transforms).toHaveLength(1);
  });

  it("omits the transform attribute when the stack is empty", () => {
    expect(new Rectangle({ width: 10, height: 10 }).toElement()).toBe(
      '<rect x="0" y="0" width="10" height="10"/>',
    );
  });
});

describe("mergeAttributes", () => {
  it("keeps group order", () => {
    expect(mergeAttributes([["x", "1"]], [["fill", "red"]], [["transform", "scale(2)"]])).toEqual([
      ["x", "1"],
      ["fill", "red"],
      ["transform", "scale(2)"],
    ]);
  });

  it("rejects colliding names", () => {
    expect(() => mergeAttributes([["fill", "black"]], [["fill", "red"]])).toThrow(
      'Duplicate SVG attribute "fill"',
    );
  });
});

describe("restrictSize", () => {
  it("uses the smaller of the two scale factors", () => {
    const rect = new Rectangle({ width: 200, height: 100 }).restrictSize(50, 50);
    expect(rect.transformString()).toBe("scale(0.25)");
  });

  it("is idempotent", () => {
    const rect = new Rectangle({ width: 200, height: 100 }).restrictSize(50, 50).restrictSize(50, 50);
    expect(rect.transformString()).toBe("scale(0.25)");
    expect(rect.transforms).toHaveLength(1);
  });

  it("never enlarges", () => {
    const rect = new Rectangle({ width: 30, height: 20 }).restrictSize(100, 100);
    expect(rect.hasTransform()).toBe(false);
  });

  it("leaves an exact fit alone", () => {
    const circle = new Circle({ r: 30 }).restrictSize(60, 60);
    expect(circle.hasTransform()).toBe(false);
  });

  it("appends after earlier translations", () => {
    const rect = new Rectangle({ width: 100, height: 50 }).translate(80, 60).restrictSize(50, 50);
    expect(rect.transformString()).toBe("translate(80,60) scale(0.5)");
    const size = transformedSize(rect);
    expect(size.width).toBeLessThanOrEqual(50 + 1e-9);
    expect(size.height).toBeLessThanOrEqual(50 + 1e-9);
  });

  it("serializes a tiny fit factor that matches the matrix", () => {
    const circle = new Circle({ r: 50 }).restrictSize(0.00001, 0.00001);
    expect(circle.transformString()).toBe("scale(1e-7)");
    expect(applyMatrix(circle.transformMatrix(), { x: 100, y: 0 }).x).toBeCloseTo(0.00001, 12);
  });

  it("accounts for scales already on the stack", () => {
    const circle = new Circle({ r: 10 }).scale(2).restrictSize(20, 20);
    expect(circle.transformString()).toBe("scale(2) scale(0.5)");
    expect(transformedSize(circle).width).toBeCloseTo(20, 9);
  });

  it("fits rotated geometry and stays idempotent", () => {
    const rect = new Rectangle({ width: 100, height: 100 }).rotate(45).restrictSize(100, 100);
    expect(rect.transforms).toHaveLength(2);
    const size = transformedSize(rect);
    expect(size.width).toBeCloseTo(100, 6);
    expect(size.height).toBeCloseTo(100, 6);

    rect.restrictSize(100, 100);
    expect(rect.transforms).toHaveLength(2);
  });

  it("does nothing for a single-point polyline", () => {
    const dot = new Polyline({ points: [[5, 5]] }).restrictSize(1, 1);
    expect(dot.hasTransform()).toBe(false);
    expect(dot.toElement()).toBe('<polyline points="5,5"/>');
  });

  it("does nothing for a polyline of coincident points", () => {
    const dot = new Polyline({
      points: [
        [5, 5],
        [5, 5],
      ],
    }).restrictSize(1, 1);
    expect(dot.hasTransform()).toBe(false);
  });

  it("handles zero width with non-zero height", () => {
    const line = new Polyline({
      points: [
        [0, 0],
        [0, 100],
      ],
    }).restrictSize(10, 10);
    expect(line.transformString()).toBe("scale(0.1)");
  });

  it("rejects negative or non-finite limits", () => {
    const rect = new Rectangle();
    expect(() => rect.restrictSize(-1, 10)).toThrow(ConfigError);
    expect(() => rect.restrictSize(10, Number.NaN)).toThrow(ConfigError);
    expect(rect.hasTransform()).toBe(false);
  });
});
