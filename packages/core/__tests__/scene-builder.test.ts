import { describe, expect, it } from "vitest";
import { buildScene } from "../src/builder/scene-builder.js";
import { joinAttrs } from "../src/format.js";
import { attrFragments } from "../src/nodes/attributes.js";
import type { SvgNode } from "../src/nodes/containers.js";
import type { SceneConfig } from "../src/types/scene.js";

function attrs(node: SvgNode | undefined): string {
  if (!node) throw new Error("missing node");
  return joinAttrs(attrFragments(node));
}

describe("buildScene", () => {
  it("configures the root element", () => {
    const svg = buildScene({
      version: "0.1",
      document: {
        width: 100,
        height: 50,
        x: 1,
        y: 2,
        viewBox: [0, 10, 100, 50],
        mode: "fragment",
        class: "a&b",
        style: { fill: "none" },
        externalResourcesRequired: true,
      },
    });

    expect(svg.mode).toBe("fragment");
    expect(attrs(svg)).toBe(
      'style="fill:none" externalResourcesRequired="true" class="a&amp;b" viewBox="0 10 100 50" width="100" height="50" x="1" y="2" xmlns="http://www.w3.org/2000/svg"',
    );
  });

  it("defaults to document mode with no view box", () => {
    const svg = buildScene({ version: "0.1", document: { width: 1, height: 2 } });
    expect(svg.mode).toBe("document");
    expect(svg.viewBox.isSet).toBe(false);
    expect(svg.children).toHaveLength(0);
  });

  it("adds children in scene order", () => {
    const scene: SceneConfig = {
      version: "0.1",
      document: {
        width: 10,
        height: 10,
        children: [
          { type: "rect", width: 4, height: 3 },
          { type: "polygon", points: [[0, 0], [10, 0], [10, 10]] },
          { type: "ellipse", cx: 1, cy: 2, rx: 3, ry: 4 },
          { type: "svg", x: 1, y: 1, width: 5, height: 5, viewBox: [0, 0, 1, 1] },
          { type: "polyline", points: [] },
        ],
      },
    };
    const svg = buildScene(scene);

    expect(svg.children.map((c) => c.kind)).toEqual([
      "rect",
      "polygon",
      "ellipse",
      "svg",
      "polyline",
    ]);
    expect(attrs(svg.children[0])).toBe('width="4" height="3" x="0" y="0"');
    expect(attrs(svg.children[1])).toBe('points="0,0 10,0 10,10"');
    expect(attrs(svg.children[3])).toBe(
      'viewBox="0 0 1 1" width="5" height="5" x="1" y="1" xmlns="http://www.w3.org/2000/svg"',
    );
  });

  it("applies transforms in order", () => {
    const svg = buildScene({
      version: "0.1",
      document: {
        width: 10,
        height: 10,
        children: [
          {
            type: "group",
            transform: [
              { translate: [5, 5] },
              { rotate: [45, 0, 0] },
              { matrix: [1, 0, 0, 1, 0, 0] },
              { skewY: 3 },
            ],
            children: [{ type: "circle", cx: 0, cy: 0, r: 1 }],
          },
        ],
      },
    });
    const group = svg.children[0];
    if (group?.kind !== "g") throw new Error("expected a group");

    expect(attrs(group)).toBe(
      'transform="translate(5,5) rotate(45,0,0) matrix(1,0,0,1,0,0) skewY(3)"',
    );
    expect(group.children.map((c) => c.kind)).toEqual(["circle"]);
  });

  it("turns flat path arguments into commands", () => {
    const svg = buildScene({
      version: "0.1",
      document: {
        width: 10,
        height: 10,
        children: [
          {
            type: "path",
            pathLength: 100,
            d: [
              { command: "M", args: [0, 0, 10, 10] },
              { command: "c", args: [1, 2, 3, 4, 5, 6] },
              { command: "S", args: [1, 2, 3, 4] },
              { command: "q", args: [1, 2, 3, 4] },
              { command: "H", args: [7] },
              { command: "v", args: [-7] },
              { command: "A", args: [5, 5, 0, 1, 0, 10, 10] },
              { command: "Z" },
            ],
          },
        ],
      },
    });
    const path = svg.children[0];
    if (path?.kind !== "path") throw new Error("expected a path");

    expect(path.commands.map((c) => c.type)).toEqual([
      "move",
      "cubic",
      "smoothCubic",
      "quadratic",
      "horizontal",
      "vertical",
      "arc",
      "close",
    ]);
    expect(path.data()).toBe(
      "M 0 0 10 10 c 1 2 3 4 5 6 S 1 2 3 4 q 1 2 3 4 H 7 v -7 A 5 5 0 1 0 10 10 z",
    );
    expect(path.pathLength).toBe(100);
  });

  it("escapes style entries from the scene", () => {
    const svg = buildScene({
      version: "0.1",
      document: {
        width: 1,
        height: 1,
        children: [
          { type: "line", x1: 0, y1: 0, x2: 1, y2: 1, style: { "font-family": '"Serif"' } },
        ],
      },
    });
    expect(attrs(svg.children[0])).toBe(
      'style="font-family:&quot;Serif&quot;" x1="0" y1="0" x2="1" y2="1"',
    );
  });
});
