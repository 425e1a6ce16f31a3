import { PNG } from 'pngjs';
import type { RgbaFrame } from '../types.js';

export type GrayscaleFrame = {
  width: number;
  height: number;
  data: Uint8Array;
};

export type BinaryMask = {
  width: number;
  height: number;
  data: Uint8Array;
};

export type Contour = {
  area: number;
  x: number;
  y: number;
  width: number;
  height: number;
};

export function decodePng(pngBuffer: Buffer): RgbaFrame {
  const image = PNG.sync.read(pngBuffer);
  return {
    width: image.width,
    height: image.height,
    data: new Uint8Array(image.data.buffer, image.data.byteOffset, image.data.byteLength)
  };
}

export function toGrayscale(frame: RgbaFrame): GrayscaleFrame {
  const { width, height, data } = frame;
  const grayscale = new Uint8Array(width * height);

  for (let i = 0; i < width * height; i += 1) {
    const offset = i * 4;
    const r = data[offset];
    const g = data[offset + 1];
    const b = data[offset + 2];
    // Rec. 709 luma coefficients
    grayscale[i] = Math.round(0.2126 * r + 0.7152 * g + 0.0722 * b);
  }

  return { width, height, data: grayscale };
}

export function absDiff(previous: GrayscaleFrame, current: GrayscaleFrame): GrayscaleFrame {
  if (previous.width !== current.width || previous.height !== current.height) {
    throw new Error('Frame dimensions must match for diff comparison');
  }

  const totalPixels = current.data.length;
  const deltas = new Uint8Array(totalPixels);
  for (let i = 0; i < totalPixels; i += 1) {
    deltas[i] = Math.abs(current.data[i] - previous.data[i]);
  }

  return { width: current.width, height: current.height, data: deltas };
}

/** Pixels strictly above the cutoff become 1, everything else 0. */
export function threshold(frame: GrayscaleFrame, cutoff: number): BinaryMask {
  const mask = new Uint8Array(frame.data.length);
  for (let i = 0; i < frame.data.length; i += 1) {
    mask[i] = frame.data[i] > cutoff ? 1 : 0;
  }
  return { width: frame.width, height: frame.height, data: mask };
}

/**
 * Background pixels reachable from the image border through 4-connected
 * background. Unreached background pixels are holes inside some blob.
 */
function markOutside(mask: BinaryMask): Uint8Array {
  const { width, height, data } = mask;
  const outside = new Uint8Array(data.length);
  const stack = new Int32Array(data.length);
  let top = 0;

  const seed = (index: number) => {
    if (data[index] === 0 && outside[index] === 0) {
      outside[index] = 1;
      stack[top] = index;
      top += 1;
    }
  };

  for (let x = 0; x < width; x += 1) {
    seed(x);
    seed((height - 1) * width + x);
  }
  for (let y = 0; y < height; y += 1) {
    seed(y * width);
    seed(y * width + width - 1);
  }

  while (top > 0) {
    top -= 1;
    const index = stack[top];
    const x = index % width;
    if (x > 0) seed(index - 1);
    if (x < width - 1) seed(index + 1);
    if (index >= width) seed(index - width);
    if (index + width < data.length) seed(index + width);
  }

  return outside;
}

/**
 * Outer regions of the mask as 8-connected pixel blobs, in raster order of
 * their first pixel. Blobs sitting inside another blob's hole are not
 * reported. Area is the blob's pixel count, not the area of its outline
 * polygon, so a ring counts its pixels only.
 */
export function findContours(mask: BinaryMask): Contour[] {
  const { width, height, data } = mask;
  if (data.length === 0) {
    return [];
  }
  const outside = markOutside(mask);
  const visited = new Uint8Array(data.length);
  const stack = new Int32Array(data.length);
  const contours: Contour[] = [];

  for (let start = 0; start < data.length; start += 1) {
    if (data[start] === 0 || visited[start] === 1) {
      continue;
    }

    let top = 0;
    stack[top] = start;
    top += 1;
    visited[start] = 1;

    let area = 0;
    let external = false;
    let minX = width;
    let minY = height;
    let maxX = -1;
    let maxY = -1;

    while (top > 0) {
      top -= 1;
      const index = stack[top];
      const x = index % width;
      const y = (index - x) / width;
      area += 1;
      if (x < minX) minX = x;
      if (x > maxX) maxX = x;
      if (y < minY) minY = y;
      if (y > maxY) maxY = y;

      if (
        x === 0 ||
        y === 0 ||
        x === width - 1 ||
        y === height - 1 ||
        outside[index - 1] === 1 ||
        outside[index + 1] === 1 ||
        outside[index - width] === 1 ||
        outside[index + width] === 1
      ) {
        external = true;
      }

      for (let dy = -1; dy <= 1; dy += 1) {
        const ny = y + dy;
        if (ny < 0 || ny >= height) {
          continue;
        }
        for (let dx = -1; dx <= 1; dx += 1) {
          const nx = x + dx;
          if ((dx === 0 && dy === 0) || nx < 0 || nx >= width) {
            continue;
          }
          const neighbor = ny * width + nx;
          if (data[neighbor] === 1 && visited[neighbor] === 0) {
            visited[neighbor] = 1;
            stack[top] = neighbor;
            top += 1;
          }
        }
      }
    }

    if (!external) {
      continue;
    }

    contours.push({
      area,
      x: minX,
      y: minY,
      width: maxX - minX + 1,
      height: maxY - minY + 1
    });
  }

  return contours;
}

export function contourArea(contour: Contour): number {
  return contour.area;
}
