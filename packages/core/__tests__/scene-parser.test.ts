import { describe, expect, it } from "vitest";
import { parseScene } from "../src/parser/scene-parser.js";

const MINIMAL_YAML = `
version: "0.1"
document:
  width: 120
  height: 80
  viewBox: [0, 0, 120, 80]
  children:
    - { type: circle, cx: 10, cy: 10, r: 5, style: { fill: red } }
    - type: group
      class: shapes
      transform:
        - translate: [5, 5]
        - rotate: [45, 0, 0]
      children:
        - type: path
          d:
            - { command: M, args: [0, 0] }
            - { command: z }
`;

describe("parseScene", () => {
  it("parses YAML", () => {
    const scene = parseScene(MINIMAL_YAML);

    expect(scene.version).toBe("0.1");
    expect(scene.document.width).toBe(120);
    expect(scene.document.viewBox).toEqual([0, 0, 120, 80]);
    expect(scene.document.children?.map((c) => c.type)).toEqual([
      "circle",
      "group",
    ]);
  });

  it("parses JSON", () => {
    const scene = parseScene(
      JSON.stringify({
        version: "0.1",
        document: {
          width: 10,
          height: 10,
          mode: "fragment",
          children: [{ type: "line", x1: 0, y1: 0, x2: 10, y2: 10 }],
        },
      }),
    );

    expect(scene.document.mode).toBe("fragment");
    expect(scene.document.children).toEqual([
      { type: "line", x1: 0, y1: 0, x2: 10, y2: 10 },
    ]);
  });

  it("reports missing fields with their path", () => {
    expect(() =>
      parseScene(`version: "0.1"\ndocument:\n  height: 10\n`),
    ).toThrow("Invalid scene (1 issue(s)):\n  - document.width: Required");
  });

  it("rejects path arguments that do not fill whole groups", () => {
    const input = `
version: "0.1"
document:
  width: 10
  height: 10
  children:
    - type: path
      d:
        - { command: C, args: [1, 2, 3, 4] }
`;
    expect(() => parseScene(input)).toThrow(
      '  - document.children.0.d.0.args <path>: "C" takes arguments in groups of 6, got 4',
    );
  });

  it("rejects arguments on close", () => {
    const input = JSON.stringify({
      version: "0.1",
      document: {
        width: 1,
        height: 1,
        children: [{ type: "path", d: [{ command: "z", args: [1] }] }],
      },
    });
    expect(() => parseScene(input)).toThrow(
      '"z" takes arguments in groups of 0, got 1',
    );
  });

  it("rejects unknown node types", () => {
    const input = JSON.stringify({
      version: "0.1",
      document: { width: 1, height: 1, children: [{ type: "text" }] },
    });
    expect(() => parseScene(input)).toThrow(/^Invalid scene \(1 issue\(s\)\):\n  - document\.children\.0\.type <text>: /);
  });

  it("rejects transform entries naming more than one operation", () => {
    const input = JSON.stringify({
      version: "0.1",
      document: {
        width: 1,
        height: 1,
        children: [
          {
            type: "group",
            transform: [{ translate: [1, 2], scale: [1, 1] }],
          },
        ],
      },
    });
    expect(() => parseScene(input)).toThrow(/^Invalid scene \(/);
  });

  it("validates nested children", () => {
    const input = JSON.stringify({
      version: "0.1",
      document: {
        width: 1,
        height: 1,
        children: [
          { type: "group", children: [{ type: "circle", cx: 0, cy: 0 }] },
        ],
      },
    });
    expect(() => parseScene(input)).toThrow(
      "  - document.children.0.children.0.r <circle>: Required",
    );
  });

  it("fails on text that is neither JSON nor YAML", () => {
    expect(() => parseScene("document: [unclosed")).toThrow(
      /^Scene is neither JSON nor YAML: /,
    );
  });
});
