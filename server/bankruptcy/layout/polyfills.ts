/**
 * Polyfills required by pdfjs-dist under Node.js.
 *
 * IMPORTANT: import this module before pdfjs-dist is loaded anywhere. The legacy
 * build probes for a global DOMMatrix when it is first evaluated.
 */

import { multiply, type Matrix } from "./operator-list";

if (!("DOMMatrix" in globalThis)) {
  class DOMMatrix {
    a = 1; b = 0; c = 0; d = 1; e = 0; f = 0;
    is2D = true;

    constructor(init?: number[] | string) {
      if (Array.isArray(init) && init.length === 6) {
        [this.a, this.b, this.c, this.d, this.e, this.f] = init;
      }
    }

    get isIdentity(): boolean {
      return this.a === 1 && this.b === 0 && this.c === 0 && this.d === 1 && this.e === 0 && this.f === 0;
    }

    toArray(): Matrix {
      return [this.a, this.b, this.c, this.d, this.e, this.f];
    }

    multiply(other: DOMMatrix) { return new DOMMatrix(multiply(this.toArray(), other.toArray())); }
    translate(tx: number, ty = 0) { return this.multiply(new DOMMatrix([1, 0, 0, 1, tx, ty])); }
    scale(sx: number, sy = sx) { return this.multiply(new DOMMatrix([sx, 0, 0, sy, 0, 0])); }

    inverse() {
      const det = this.a * this.d - this.b * this.c;
      if (det === 0) return new DOMMatrix([NaN, NaN, NaN, NaN, NaN, NaN]);
      return new DOMMatrix([
        this.d / det,
        -this.b / det,
        -this.c / det,
        this.a / det,
        (this.c * this.f - this.d * this.e) / det,
        (this.b * this.e - this.a * this.f) / det,
      ]);
    }

    transformPoint(point: { x: number; y: number }) {
      return {
        x: this.a * point.x + this.c * point.y + this.e,
        y: this.b * point.x + this.d * point.y + this.f,
        z: 0,
        w: 1,
      };
    }
  }
  (globalThis as Record<string, unknown>).DOMMatrix = DOMMatrix;
}

// Side effects only
export {};
