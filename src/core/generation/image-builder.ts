/**
 * Image builder - TID-mapped stencils rendered as embedded images
 */

import { createHash } from 'crypto';
import type { BinaryFileData, BuildResult, ConversionContext, FlatNode, ImageElement } from '../types.js';
import { createBaseFields } from './element-factory.js';
import { degreesToRadians, floorSize } from './rectangle-builder.js';

export type ImageMimeType = 'image/png' | 'image/jpeg' | 'image/svg+xml';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47];
const JPEG_SIGNATURE = [0xff, 0xd8, 0xff];

function startsWith(bytes: Uint8Array, signature: readonly number[]): boolean {
  return signature.every((byte, i) => bytes[i] === byte);
}

/**
 * Detect the MIME type from the leading bytes; PNG when unrecognized
 */
export function detectMimeType(bytes: Uint8Array): ImageMimeType {
  if (startsWith(bytes, PNG_SIGNATURE)) return 'image/png';
  if (startsWith(bytes, JPEG_SIGNATURE)) return 'image/jpeg';

  const head = Buffer.from(bytes.subarray(0, 256)).toString('utf8').trimStart();
  if (head.startsWith('<svg') || head.startsWith('<?xml')) return 'image/svg+xml';

  return 'image/png';
}

export function toDataUrl(bytes: Uint8Array, mimeType: string): string {
  return `data:${mimeType};base64,${Buffer.from(bytes).toString('base64')}`;
}

/**
 * Content-addressed file id: the same image is stored once per document
 */
export function fileIdFor(bytes: Uint8Array): string {
  return createHash('sha1').update(bytes).digest('hex');
}

export function getShapeTid(node: Pick<FlatNode, 'graphic'>): string | undefined {
  return node.graphic?.Shape?.tid;
}

/**
 * Whether the resolver wants this node drawn as an image
 */
export function wantsImage(node: FlatNode, context: ConversionContext): boolean {
  const tid = getShapeTid(node);
  return tid !== undefined && context.resolver !== undefined && context.resolver.shouldUseImage(tid);
}

export function buildImage(node: FlatNode, context: ConversionContext): BuildResult<ImageElement> {
  const tid = getShapeTid(node);
  const bytes = tid === undefined ? null : context.resolver?.getImageBytes(tid) ?? null;
  if (!bytes || bytes.length === 0) {
    return { ok: false, reason: 'UnresolvedImage' };
  }

  const mimeType = detectMimeType(bytes);
  const fileId = fileIdFor(bytes);
  const file: BinaryFileData = {
    id: fileId,
    mimeType,
    dataURL: toDataUrl(bytes, mimeType),
    created: context.factory.now(),
  };

  const element: ImageElement = {
    ...createBaseFields(context.factory, 'image'),
    type: 'image',
    x: node.x,
    y: node.y,
    width: floorSize(node.width),
    height: floorSize(node.height),
    angle: degreesToRadians(node.rotation),
    strokeColor: 'transparent',
    fileId,
    scale: [1, 1],
    status: 'saved',
  };

  return { ok: true, element, file };
}
