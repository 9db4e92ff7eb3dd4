import { n } from "../format.js";

/** The `viewBox` attribute of an `<svg>` element. Contributes nothing until set. */
export class ViewBox {
  private minXValue = 0;
  private minYValue = 0;
  private widthValue = 0;
  private heightValue = 0;
  private setFlag = false;

  set(minX: number, minY: number, width: number, height: number): this {
    this.minXValue = minX;
    this.minYValue = minY;
    this.widthValue = width;
    this.heightValue = height;
    this.setFlag = true;
    return this;
  }

  clear(): this {
    this.setFlag = false;
    return this;
  }

  get isSet(): boolean {
    return this.setFlag;
  }

  get minX(): number {
    return this.minXValue;
  }

  get minY(): number {
    return this.minYValue;
  }

  get width(): number {
    return this.widthValue;
  }

  get height(): number {
    return this.heightValue;
  }

  attrFragment(): string {
    if (!this.setFlag) return "";
    const { minX, minY, width, height } = this;
    return `viewBox="${n(minX)} ${n(minY)} ${n(width)} ${n(height)}"`;
  }
}
