/**
 * Jest setup file — polyfills for APIs missing from jsdom.
 */

// DOMMatrix polyfill (jsdom doesn't provide it). 2D affine part only.
if (typeof globalThis.DOMMatrix === "undefined") {
  class DOMMatrixPolyfill {
    a: number;
    b: number;
    c: number;
    d: number;
    e: number;
    f: number;

    get is2D() { return true; }
    get isIdentity() {
      return this.a === 1 && this.b === 0 && this.c === 0 &&
             this.d === 1 && this.e === 0 && this.f === 0;
    }

    constructor(init?: number[]) {
      if (init && init.length >= 6) {
        this.a = init[0];
        this.b = init[1];
        this.c = init[2];
        this.d = init[3];
        this.e = init[4];
        this.f = init[5];
      } else {
        // Identity matrix
        this.a = 1;
        this.b = 0;
        this.c = 0;
        this.d = 1;
        this.e = 0;
        this.f = 0;
      }
    }

    static fromMatrix(other: DOMMatrixPolyfill): DOMMatrixPolyfill {
      return new DOMMatrixPolyfill([other.a, other.b, other.c, other.d, other.e, other.f]);
    }

    toString(): string {
      return `matrix(${this.a}, ${this.b}, ${this.c}, ${this.d}, ${this.e}, ${this.f})`;
    }
  }

  Object.defineProperty(globalThis, "DOMMatrix", {
    value: DOMMatrixPolyfill,
    configurable: true,
    writable: true,
  });
}

// OffscreenCanvas polyfill (jsdom doesn't provide it)
if (typeof globalThis.OffscreenCanvas === "undefined") {
  class OffscreenCanvasPolyfill {
    width: number;
    height: number;
    constructor(width: number, height: number) {
      this.width = width;
      this.height = height;
    }
    getContext(type: string): Record<string, unknown> | null {
      if (type !== "2d") return null;
      // Minimal 2D context with the methods Canvas2DBackend layers need
      const stack: number[][] = [];
      let current = [1, 0, 0, 1, 0, 0];
      return {
        canvas: this,
        save() { stack.push([...current]); },
        restore() { const prev = stack.pop(); if (prev) current = prev; },
        setTransform(a: number, b: number, c: number, d: number, e: number, f: number) {
          current = [a, b, c, d, e, f];
        },
        getTransform() { return new DOMMatrix(current); },
        fillStyle: "",
        strokeStyle: "",
        lineWidth: 1,
        globalCompositeOperation: "source-over",
        shadowColor: "",
        shadowBlur: 0,
        shadowOffsetX: 0,
        shadowOffsetY: 0,
        clearRect() {},
        fillRect() {},
        fill() {},
        stroke() {},
        clip() {},
        drawImage() {},
        beginPath() {},
        rect() {},
        roundRect() {},
      };
    }
  }

  Object.defineProperty(globalThis, "OffscreenCanvas", {
    value: OffscreenCanvasPolyfill,
    configurable: true,
    writable: true,
  });
}
