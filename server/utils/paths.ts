import path from 'path';
import { minimatch } from 'minimatch';
import type { AssetKind } from '../types/index.js';

// File extension to asset kind, used when a path is outside every registered directory
const EXTENSION_MAP: Record<string, AssetKind> = {
  '.png': 'image',
  '.jpg': 'image',
  '.jpeg': 'image',
  '.webp': 'image',
  '.glb': 'model',
  '.gltf': 'model',
  '.obj': 'model',
  '.fbx': 'model',
};

const IGNORED_PATTERNS = [
  /^\./, // Hidden files
  /thumbs\.db/i,
  /desktop\.ini/i,
];

const GENERATOR_PREFIXES = ['comfyui_', 'hy3d_', 'image_', 'model_'];
const GENERATOR_SUFFIXES = ['_3d', '_model', '_mesh'];
const TEXTURED_MARKERS: Array<{ prefix?: string; suffix?: string }> = [
  { prefix: 'textured_' },
  { suffix: '_textured' },
  { suffix: '_with_texture' },
];

export function kindFromExtension(filePath: string): AssetKind | null {
  return EXTENSION_MAP[path.extname(filePath).toLowerCase()] ?? null;
}

export function shouldIgnore(name: string): boolean {
  return IGNORED_PATTERNS.some(pattern => pattern.test(name));
}

/** Case-insensitive match of the file's basename against glob patterns like `*.png` */
export function matchesPatterns(filePath: string, patterns: readonly string[]): boolean {
  const name = path.basename(filePath);
  if (shouldIgnore(name)) return false;
  return patterns.some(pattern => minimatch(name, pattern, { nocase: true, dot: false }));
}

/** True when filePath sits in directory (or below it, when recursive) */
export function isInside(filePath: string, directory: string, recursive: boolean): boolean {
  const parent = path.dirname(filePath);
  if (parent === directory) return true;
  if (!recursive) return false;
  const relative = path.relative(directory, filePath);
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

export function lowerStem(filePath: string): string {
  return path.basename(filePath, path.extname(filePath)).toLowerCase();
}

/**
 * Name fragment shared by an image and the model generated from it:
 * lowercase stem without digit runs, separators and generator prefixes/suffixes
 */
export function nameFragment(filePath: string): string {
  let fragment = lowerStem(filePath);
  for (const prefix of GENERATOR_PREFIXES) {
    if (fragment.startsWith(prefix)) fragment = fragment.slice(prefix.length);
  }
  for (const suffix of GENERATOR_SUFFIXES) {
    if (fragment.endsWith(suffix)) fragment = fragment.slice(0, -suffix.length);
  }
  return fragment.replace(/\d+/g, '').replace(/[_\-\s.]+/g, '');
}

export function namesCorrelate(imagePath: string, modelPath: string): boolean {
  if (lowerStem(imagePath) === lowerStem(modelPath)) return true;

  const image = nameFragment(imagePath);
  const model = nameFragment(modelPath);
  if (image.length < 4 || model.length < 4) return false;
  return image.includes(model) || model.includes(image);
}

/** Stem of the untextured model a textured variant was derived from */
export function texturedBaseStem(texturedPath: string): string {
  const stem = lowerStem(texturedPath);
  for (const marker of TEXTURED_MARKERS) {
    if (marker.prefix && stem.startsWith(marker.prefix)) return stem.slice(marker.prefix.length);
    if (marker.suffix && stem.endsWith(marker.suffix)) return stem.slice(0, -marker.suffix.length);
  }
  return stem;
}
