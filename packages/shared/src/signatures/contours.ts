/**
 * Binary Image Contour Analysis
 *
 * Grayscale conversion, inverse binary thresholding and external contour
 * extraction over raw RGBA bitmaps. Ink pixels form 8-connected components;
 * a component is external when it is not enclosed by another component's hole.
 */

import type { BoundingBox } from '../types';

// Grayscale conversion coefficients (ITU-R BT.601)
const GRAYSCALE_R = 0.299;
const GRAYSCALE_G = 0.587;
const GRAYSCALE_B = 0.114;

export interface RgbaImage {
  width: number;
  height: number;
  /** RGBA, 4 bytes per pixel, row-major */
  data: Uint8ClampedArray | Uint8Array;
}

export interface BinaryImage {
  width: number;
  height: number;
  /** 1 = ink, 0 = background */
  data: Uint8Array;
}

export interface Point {
  x: number;
  y: number;
}

export interface Contour {
  points: Point[];
  area: number;
  boundingBox: BoundingBox;
}

/**
 * Convert RGBA pixels to single-channel intensity (0-255)
 */
export function toGrayscale(image: RgbaImage): Uint8Array {
  const { width, height, data } = image;
  const gray = new Uint8Array(width * height);

  for (let i = 0, p = 0; p < gray.length; i += 4, p++) {
    gray[p] = Math.round(data[i] * GRAYSCALE_R + data[i + 1] * GRAYSCALE_G + data[i + 2] * GRAYSCALE_B);
  }

  return gray;
}

/**
 * Inverse binary threshold: pixels at or below the threshold become ink
 */
export function binarizeInverse(gray: Uint8Array, width: number, height: number, threshold: number): BinaryImage {
  const data = new Uint8Array(width * height);
  for (let p = 0; p < data.length; p++) {
    data[p] = gray[p] <= threshold ? 1 : 0;
  }
  return { width, height, data };
}

// Neighbour offsets, counter-clockwise on screen (y grows downwards), starting east
const DX = [1, 1, 0, -1, -1, -1, 0, 1];
const DY = [0, -1, -1, -1, 0, 1, 1, 1];

function directionOf(dx: number, dy: number): number {
  for (let d = 0; d < 8; d++) {
    if (DX[d] === dx && DY[d] === dy) return d;
  }
  throw new Error(`Not a neighbour offset: (${dx}, ${dy})`);
}

/**
 * Mark background reachable from outside the image (4-connected, which is
 * the dual of 8-connected ink).
 */
function markOuterBackground(image: BinaryImage): Uint8Array {
  const { width, height, data } = image;
  const outer = new Uint8Array(width * height);
  const stack: number[] = [];

  const seed = (x: number, y: number) => {
    const p = y * width + x;
    if (data[p] === 0 && outer[p] === 0) {
      outer[p] = 1;
      stack.push(p);
    }
  };

  for (let x = 0; x < width; x++) {
    seed(x, 0);
    seed(x, height - 1);
  }
  for (let y = 0; y < height; y++) {
    seed(0, y);
    seed(width - 1, y);
  }

  for (let p = stack.pop(); p !== undefined; p = stack.pop()) {
    const x = p % width;
    const y = (p - x) / width;
    if (x > 0) seed(x - 1, y);
    if (x < width - 1) seed(x + 1, y);
    if (y > 0) seed(x, y - 1);
    if (y < height - 1) seed(x, y + 1);
  }

  return outer;
}

/**
 * Trace the outer border of the component containing `start`, which must be
 * the component's first pixel in raster order (its west neighbour is background).
 */
export function traceOuterBorder(image: BinaryImage, start: Point): Point[] {
  const { width, height, data } = image;
  const isInk = (x: number, y: number) => x >= 0 && y >= 0 && x < width && y < height && data[y * width + x] === 1;

  // Clockwise search from the west neighbour for the first ink pixel
  const west = 4;
  let first = -1;
  for (let k = 0; k < 8; k++) {
    const d = (west - k + 8) % 8;
    if (isInk(start.x + DX[d], start.y + DY[d])) {
      first = d;
      break;
    }
  }
  if (first === -1) return [{ x: start.x, y: start.y }];

  const second: Point = { x: start.x + DX[first], y: start.y + DY[first] };
  const points: Point[] = [];
  let prev: Point = second;
  let current: Point = { x: start.x, y: start.y };

  for (;;) {
    points.push(current);

    // Counter-clockwise search around `current`, starting just after `prev`
    const from = directionOf(prev.x - current.x, prev.y - current.y);
    let next: Point = prev;
    for (let k = 1; k <= 8; k++) {
      const d = (from + k) % 8;
      const nx = current.x + DX[d];
      const ny = current.y + DY[d];
      if (isInk(nx, ny)) {
        next = { x: nx, y: ny };
        break;
      }
    }

    if (next.x === start.x && next.y === start.y && current.x === second.x && current.y === second.y) {
      break;
    }
    prev = current;
    current = next;
  }

  return points;
}

/**
 * Polygon area by the shoelace formula
 */
export function polygonArea(points: Point[]): number {
  if (points.length < 3) return 0;

  let twice = 0;
  for (let i = 0; i < points.length; i++) {
    const a = points[i];
    const b = points[(i + 1) % points.length];
    twice += a.x * b.y - b.x * a.y;
  }
  return Math.abs(twice) / 2;
}

function boundingBoxOf(points: Point[]): BoundingBox {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const { x, y } of points) {
    if (x < minX) minX = x;
    if (y < minY) minY = y;
    if (x > maxX) maxX = x;
    if (y > maxY) maxY = y;
  }
  return { x: minX, y: minY, width: maxX - minX + 1, height: maxY - minY + 1 };
}

/**
 * Find the outer contours of all ink components that are not nested inside
 * another component.
 */
export function findExternalContours(image: BinaryImage): Contour[] {
  const { width, height, data } = image;
  const outer = markOuterBackground(image);
  const labels = new Int32Array(width * height);
  const contours: Contour[] = [];
  let nextLabel = 1;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const p = y * width + x;
      if (data[p] !== 1 || labels[p] !== 0) continue;

      // First pixel of a new component in raster order
      const label = nextLabel++;
      let external = false;
      const stack = [p];
      labels[p] = label;

      for (let q = stack.pop(); q !== undefined; q = stack.pop()) {
        const qx = q % width;
        const qy = (q - qx) / width;

        for (let d = 0; d < 8; d++) {
          const nx = qx + DX[d];
          const ny = qy + DY[d];
          if (nx < 0 || ny < 0 || nx >= width || ny >= height) {
            external = true;
            continue;
          }
          const n = ny * width + nx;
          if (data[n] === 1) {
            if (labels[n] === 0) {
              labels[n] = label;
              stack.push(n);
            }
          } else if (d % 2 === 0 && outer[n] === 1) {
            external = true;
          }
        }
      }

      if (!external) continue;

      const points = traceOuterBorder(image, { x, y });
      contours.push({
        points,
        area: polygonArea(points),
        boundingBox: boundingBoxOf(points),
      });
    }
  }

  return contours;
}
