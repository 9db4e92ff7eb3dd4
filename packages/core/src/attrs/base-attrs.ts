import { boolAttr, stringAttr } from "../format.js";
import { Style } from "./style.js";
import { Transform } from "./transform.js";

/** Attributes shared by every document node, the root included. */
export class BaseAttrs {
  readonly style = new Style();
  externalResourcesRequired = false;
  className = "";

  /** style, externalResourcesRequired, class. Unset entries are empty strings. */
  attrFragments(): string[] {
    return [
      this.style.attrFragment(),
      this.externalResourcesRequired
        ? boolAttr("externalResourcesRequired", true)
        : "",
      stringAttr("class", this.className),
    ];
  }
}

/** Attributes of every shape-producing node: the base set plus a transform list. */
export class ShapeAttrs {
  readonly base = new BaseAttrs();
  readonly transform = new Transform();

  attrFragments(): string[] {
    return [...this.base.attrFragments(), this.transform.attrFragment()];
  }
}
