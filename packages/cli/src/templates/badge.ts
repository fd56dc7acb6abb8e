export const badgeTemplate = `version: "0.1"
title: "Badge"
canvas:
  width: 120
  height: 120

components:
  - type: circle
    config: { cx: 60, cy: 60, r: 56 }
    appearance: { fill: "#1f6feb", stroke: "#0b3d91", strokeWidth: 4 }

  - type: text
    config: { x: 60, y: 60, text: "OK", fontSize: 40, color: white }
`;
