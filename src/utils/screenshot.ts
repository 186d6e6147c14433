// Get image dimensions from PNG data
export function getPNGDimensions(pngData: Buffer): { width: number; height: number } {
  // PNG signature: 89 50 4E 47 0D 0A 1A 0A
  if (pngData.length < 24 || pngData.toString('hex', 0, 8) !== '89504e470d0a1a0a') {
    throw new Error('Invalid PNG data');
  }

  // IHDR is always the first chunk; width and height are its first two fields
  const width = pngData.readUInt32BE(16);
  const height = pngData.readUInt32BE(20);

  return { width, height };
}

export function isPNG(data: Buffer): boolean {
  return data.length >= 8 && data.toString('hex', 0, 8) === '89504e470d0a1a0a';
}

// Convert binary data to base64
export function binaryToBase64(data: Buffer): string {
  return data.toString('base64');
}
