export const badgeTemplate = `version: "0.1"
document:
  width: 64
  height: 64
  viewBox: [0, 0, 64, 64]
  mode: fragment
  children:
    - type: polygon
      points: [[32, 2], [60, 18], [60, 46], [32, 62], [4, 46], [4, 18]]
      style: { fill: "#2a7", stroke: "#153" }
    - type: path
      style: { fill: none, stroke: white, stroke-width: "4" }
      d:
        - { command: M, args: [18, 33] }
        - { command: l, args: [9, 9, 19, -19] }
`;
