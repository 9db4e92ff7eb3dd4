export const basicTemplate = `version: "0.1"
document:
  width: 200
  height: 120
  viewBox: [0, 0, 200, 120]
  children:
    - type: rect
      width: 200
      height: 120
      style: { fill: "#f4f4f4" }
    - type: group
      class: shapes
      transform:
        - translate: [20, 20]
      children:
        - { type: circle, cx: 30, cy: 30, r: 25, style: { fill: "#d33" } }
        - { type: ellipse, cx: 110, cy: 30, rx: 40, ry: 20 }
        - type: polyline
          points: [[0, 80], [40, 60], [80, 80], [120, 60]]
          style: { fill: none, stroke: "#333" }
    - type: path
      style: { fill: none, stroke: "#06c", stroke-width: "2" }
      d:
        - { command: M, args: [10, 110] }
        - { command: C, args: [60, 80, 140, 80, 190, 110] }
`;
