/**
 * Media type inference for artifacts.
 *
 * The server reports only file names, so the extension decides. When the
 * extension is unknown the payload's leading bytes are checked once fetched.
 */

const EXTENSION_TYPES: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  webp: 'image/webp',
  gif: 'image/gif',
  bmp: 'image/bmp',
  tif: 'image/tiff',
  tiff: 'image/tiff',
  mp4: 'video/mp4',
  webm: 'video/webm',
  mov: 'video/quicktime',
  wav: 'audio/wav',
  mp3: 'audio/mpeg',
  flac: 'audio/flac',
  ogg: 'audio/ogg',
  json: 'application/json',
  txt: 'text/plain',
  glb: 'model/gltf-binary',
};

export const UNKNOWN_MEDIA_TYPE = 'application/octet-stream';

export function mediaTypeFromFilename(filename: string): string {
  const dot = filename.lastIndexOf('.');
  if (dot < 0 || dot === filename.length - 1) return UNKNOWN_MEDIA_TYPE;
  return EXTENSION_TYPES[filename.slice(dot + 1).toLowerCase()] ?? UNKNOWN_MEDIA_TYPE;
}

/** Infer a media type from magic bytes. */
export function sniffMediaType(bytes: Uint8Array): string {
  if (bytes.length < 4) return UNKNOWN_MEDIA_TYPE;
  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, Math.min(bytes.length, 16));

  // PNG
  if (buf[0] === 0x89 && buf[1] === 0x50 && buf[2] === 0x4e && buf[3] === 0x47) {
    return 'image/png';
  }
  // JPEG
  if (buf[0] === 0xff && buf[1] === 0xd8 && buf[2] === 0xff) {
    return 'image/jpeg';
  }
  // GIF
  if (buf[0] === 0x47 && buf[1] === 0x49 && buf[2] === 0x46) {
    return 'image/gif';
  }
  if (buf.length >= 12 && buf.toString('ascii', 0, 4) === 'RIFF') {
    const kind = buf.toString('ascii', 8, 12);
    if (kind === 'WEBP') return 'image/webp';
    if (kind === 'WAVE') return 'audio/wav';
  }
  // MP4 (ftyp box)
  if (buf.length >= 8 && buf.toString('ascii', 4, 8) === 'ftyp') {
    return 'video/mp4';
  }
  // WebM
  if (buf[0] === 0x1a && buf[1] === 0x45 && buf[2] === 0xdf && buf[3] === 0xa3) {
    return 'video/webm';
  }
  return UNKNOWN_MEDIA_TYPE;
}
