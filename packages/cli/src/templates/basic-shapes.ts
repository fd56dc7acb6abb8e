export const basicShapesTemplate = `version: "0.1"
title: "Basic shapes"
canvas:
  width: 400
  height: 300
  background: white

components:
  - type: rectangle
    id: frame
    config: { x: 0, y: 0, width: 100, height: 50, rx: 6 }
    appearance: { fill: lightsteelblue, stroke: steelblue, strokeWidth: 2 }
    transforms:
      - translate: [40, 40]

  - type: circle
    id: sun
    config: { cx: 0, cy: 0, r: 50 }
    appearance: { fill: gold, stroke: orange, strokeWidth: 3 }
    transforms:
      - translate: [260, 80]
    restrictSize: [60, 60]

  - type: polyline
    id: zigzag
    config:
      points: [[0, 0], [20, 30], [40, 0], [60, 30], [80, 0]]
    appearance: { fill: none, stroke: teal, strokeWidth: 2, strokeDasharray: [6, 3] }
    transforms:
      - translate: [40, 180]
      - rotate: { angle: -10, pivot: [40, 15] }

  - type: text
    id: caption
    config: { x: 200, y: 270, text: "Hello, shapes", fontSize: 18 }
`;
