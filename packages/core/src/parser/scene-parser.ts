import yaml from "js-yaml";
import type { ZodIssue } from "zod";
import type { SceneConfig } from "../types/scene.js";
import { SceneConfigSchema } from "../types/scene.js";

function parseJson(input: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(input) };
  } catch {
    return { ok: false };
  }
}

/** JSON when it parses as JSON, YAML otherwise */
function loadSceneText(input: string): unknown {
  const json = parseJson(input);
  if (json.ok) return json.value;
  try {
    return yaml.load(input);
  } catch (err) {
    throw new Error(
      `Scene is neither JSON nor YAML: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

/** `type` of the innermost scene node along `path`, if any */
function nodeTypeAt(raw: unknown, path: readonly (string | number)[]): string | undefined {
  let current: unknown = raw;
  let found: string | undefined;
  for (const key of path) {
    if (typeof current !== "object" || current === null) break;
    const type: unknown = Reflect.get(current, "type");
    if (typeof type === "string") found = type;
    current = Reflect.get(current, key);
  }
  return found;
}

function describeIssue(raw: unknown, issue: ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  const type = nodeTypeAt(raw, issue.path);
  return type === undefined
    ? `  - ${where}: ${issue.message}`
    : `  - ${where} <${type}>: ${issue.message}`;
}

/**
 * Parse scene text into a validated SceneConfig. Each schema issue becomes
 * one line naming its path and, inside a node, the node's `type`.
 */
export function parseScene(input: string): SceneConfig {
  const raw = loadSceneText(input);
  const result = SceneConfigSchema.safeParse(raw);
  if (result.success) return result.data;

  const lines = result.error.issues.map((issue) => describeIssue(raw, issue));
  throw new Error(`Invalid scene (${lines.length} issue(s)):\n${lines.join("\n")}`);
}
