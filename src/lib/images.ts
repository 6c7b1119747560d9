import fs from 'node:fs';
import path from 'node:path';
import imageSize from 'image-size';
import { logger } from './logger';

export type ImageDimensions = { width: number; height: number };

const log = logger.child('images');

export function isRemoteUrl(src: string): boolean {
  return /^[a-z][a-z0-9+.-]*:/i.test(src) || src.startsWith('//');
}

export function isRootPath(src: string): boolean {
  return src.startsWith('/') && !src.startsWith('//');
}

/**
 * File under the public directory that serves a site path, query and
 * fragment dropped. `..` segments stop at the site root, as in a browser.
 */
export function resolvePublicPath(publicDir: string, src: string): string {
  const sitePath = path.posix.normalize(`/${safeDecode(stripQuery(src)).replace(/^\/+/, '')}`);
  return path.join(publicDir, sitePath.slice(1));
}

export function stripQuery(href: string): string {
  return href.split(/[?#]/)[0] ?? '';
}

export function safeDecode(value: string): string {
  try {
    return decodeURI(value);
  } catch {
    return value; // malformed escapes are looked up verbatim
  }
}

/**
 * Width and height of an image served from the site root, or undefined for
 * remote and relative sources, missing files and formats image-size cannot read.
 */
export function measureImage(publicDir: string, src: string): ImageDimensions | undefined {
  // relative paths resolve against the page URL, not the public directory
  if (!isRootPath(src)) return undefined;
  const imgPath = resolvePublicPath(publicDir, src);
  if (!fs.existsSync(imgPath)) return undefined;
  try {
    const { width, height } = imageSize(imgPath);
    if (!width || !height) return undefined;
    return { width, height };
  } catch (error) {
    log.debug('Could not measure image', { src, reason: error instanceof Error ? error.message : String(error) });
    return undefined;
  }
}
