import { buildScene, parseScene } from "@svgtree/core";
import { renderToString } from "@svgtree/render-svg";
import { describe, expect, it } from "vitest";
import { templates } from "../src/templates/index.js";

describe("init templates", () => {
  it("offers basic and badge", () => {
    expect(Object.keys(templates)).toEqual(["basic", "badge"]);
  });

  for (const [name, text] of Object.entries(templates)) {
    it(`${name} parses and builds`, () => {
      const svg = buildScene(parseScene(text));
      expect(svg.children.length).toBeGreaterThan(0);
    });
  }

  it("basic renders a complete document", () => {
    const svg = buildScene(parseScene(templates.basic));
    const out = renderToString(svg);

    expect(out.startsWith('<?xml version="1.0"?><svg viewBox="0 0 200 120" width="200" height="120"')).toBe(true);
    expect(out).toContain(
      '<g class="shapes" transform="translate(20,20)"><circle style="fill:#d33" cx="30" cy="30" r="25"/>',
    );
    expect(out).toContain('d="M 10 110 C 60 80 140 80 190 110"');
  });

  it("badge renders as a fragment", () => {
    const svg = buildScene(parseScene(templates.badge));
    const out = renderToString(svg);

    expect(out.startsWith("<svg ")).toBe(true);
    expect(out).toContain('d="M 18 33 l 9 9 19 -19"');
  });
});
