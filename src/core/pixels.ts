/**
 * Pixel conversions between the container's layouts and RGBA.
 */

/**
 * Swap bytes 0 and 2 of every 4-byte pixel in place (BGRA <-> RGBA).
 * Applying it twice restores the input.
 */
export function swapRedBlue(pixels: Uint8Array): Uint8Array {
  const end = pixels.length - (pixels.length % 4)
  for (let i = 0; i < end; i += 4) {
    const b = pixels[i]
    pixels[i] = pixels[i + 2]
    pixels[i + 2] = b
  }
  return pixels
}

/** Font bitmaps are one alpha byte per pixel; the glyphs are white. */
export function expandAlpha(alpha: Uint8Array): Uint8Array {
  const out = new Uint8Array(alpha.length * 4).fill(0xff)
  for (let i = 0; i < alpha.length; i++) {
    out[i * 4 + 3] = alpha[i]
  }
  return out
}
