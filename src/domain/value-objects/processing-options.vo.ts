import { ImageFormat } from './image-format.vo';

/**
 * Processing Options Value Object
 * Transformation parameters decoded from the request path
 */
export enum ResizeType {
  FIT = 'fit',
  FILL = 'fill',
  CROP = 'crop',
}

export enum Gravity {
  CENTER = 'ce',
  NORTH = 'no',
  EAST = 'ea',
  SOUTH = 'so',
  WEST = 'we',
  SMART = 'sm',
}

export const RESIZE_TYPES: ReadonlyMap<string, ResizeType> = new Map(
  Object.values(ResizeType).map((type) => [type, type]),
);

export const GRAVITY_TYPES: ReadonlyMap<string, Gravity> = new Map(
  Object.values(Gravity).map((gravity) => [gravity, gravity]),
);

export interface ProcessingOptions {
  readonly resizeType: ResizeType;
  readonly width: number;
  readonly height: number;
  readonly gravity: Gravity;
  readonly enlarge: boolean;
  readonly format: ImageFormat;
}

export function createProcessingOptions(props: ProcessingOptions): ProcessingOptions {
  return Object.freeze({
    resizeType: props.resizeType,
    width: props.width,
    height: props.height,
    gravity: props.gravity,
    enlarge: props.enlarge,
    format: props.format,
  });
}

/**
 * Stable textual form used for fingerprints and logs. Field order is fixed
 * so equal options always serialize identically.
 */
export function serializeProcessingOptions(options: ProcessingOptions): string {
  return [
    `resize:${options.resizeType}`,
    `width:${options.width}`,
    `height:${options.height}`,
    `gravity:${options.gravity}`,
    `enlarge:${options.enlarge ? 1 : 0}`,
    `format:${options.format}`,
  ].join(';');
}
