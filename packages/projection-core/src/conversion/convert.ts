// ---------------------------------------------------------------------------
// Conversion pipeline
// ---------------------------------------------------------------------------
// destination.getCoordinateMap() -> rotation.rotate(map)* ->
// source.processCoordinateMap(map), optionally supersampled.
// ---------------------------------------------------------------------------

import {
  conversionOptionsSchema,
  degreesToRadians,
  projectionDescriptorSchema,
  type ConversionOptionsInput,
  type ProjectionDescriptor,
  type LensName,
  type ProjectionDescriptorInput,
} from '@lensmap/shared';
import { createLogger, loadConfig, type LensmapConfig, type Logger } from '@lensmap/config';
import type { PixelBuffer } from '../types.js';
import { InvalidParameterError, parseParameter } from '../errors.js';
import { getLens, type Lens } from '../lens/lens.js';
import { Rotation } from '../rotation/rotation.js';
import { createPixelBuffer, downsamplePixelBuffer } from '../images/pixel-buffer.js';
import { CameraImage } from '../images/camera-image.js';
import { DoubleCameraImage } from '../images/double-camera-image.js';
import { PanoramaImage } from '../images/panorama-image.js';
import {
  computeDoubleMagnitude,
  computeMagnitude,
  type KernelOptions,
  type ProjectionImage,
} from '../images/projection-image.js';

/** A camera or double descriptor. */
export type PhotoDescriptorInput = Exclude<ProjectionDescriptorInput, { type: 'panorama' }>;

export interface ProjectionImageOptions extends KernelOptions {
  /** Feather margin of double images, in radians. */
  blendMargin?: number;
}

export interface ImageSize {
  width: number;
  height: number;
}

export interface ConversionRequest {
  image: PixelBuffer;
  source: ProjectionDescriptorInput;
  destination: ProjectionDescriptorInput;
}

export interface ConvertOptions extends ConversionOptionsInput {
  /** Defaults to {@link loadConfig} over `process.env`. */
  config?: LensmapConfig;
  logger?: Logger;
}

export function createProjectionImage(
  descriptor: ProjectionDescriptorInput,
  image: PixelBuffer,
  options: ProjectionImageOptions = {},
): ProjectionImage {
  const parsed = parseParameter(projectionDescriptorSchema, descriptor, 'projection');
  switch (parsed.type) {
    case 'camera':
      return new CameraImage(image, {
        fov: parsed.fov,
        lens: parsed.lens,
        layout: parsed.layout,
        magnitude: parsed.magnitude,
        rowChunks: options.rowChunks,
      });
    case 'double':
      return new DoubleCameraImage(image, {
        fov: parsed.fov,
        lens: parsed.lens,
        magnitude: parsed.magnitude,
        blendMargin: options.blendMargin,
        rowChunks: options.rowChunks,
      });
    case 'panorama':
      return new PanoramaImage(image, { rowChunks: options.rowChunks });
  }
}

/**
 * Output size for a conversion. Height defaults to the source's; panoramas
 * and double images are twice as wide as tall, camera images square unless
 * a width is given.
 */
export function resolveDestinationSize(
  descriptor: ProjectionDescriptor,
  source: ImageSize,
  requested: Partial<ImageSize> = {},
): ImageSize {
  const height = requested.height ?? source.height;
  switch (descriptor.type) {
    case 'camera':
      return { width: requested.width ?? height, height };
    case 'double':
    case 'panorama': {
      const width = 2 * height;
      if (requested.width !== undefined && requested.width !== width) {
        throw new InvalidParameterError(
          'width',
          `a ${descriptor.type} image of height ${height} must be ${width} wide, got ${requested.width}`,
        );
      }
      return { width, height };
    }
  }
}

/**
 * The descriptor of a destination rendered `factor` times larger, with the
 * image circle scaled from the output size so every sub-sample block lines
 * up with the output pixel it averages into.
 */
function scaleDescriptor(
  descriptor: ProjectionDescriptor,
  size: ImageSize,
  factor: number,
): ProjectionDescriptor {
  switch (descriptor.type) {
    case 'camera': {
      const magnitude =
        descriptor.magnitude ?? computeMagnitude(descriptor.layout, size.width, size.height);
      return { ...descriptor, magnitude: magnitude * factor };
    }
    case 'double': {
      const magnitude = descriptor.magnitude ?? computeDoubleMagnitude(size.height);
      return { ...descriptor, magnitude: magnitude * factor };
    }
    case 'panorama':
      return descriptor;
  }
}

/**
 * Resample `request.image` from the source projection into the destination
 * projection.
 */
export function convertImage(request: ConversionRequest, options: ConvertOptions = {}): PixelBuffer {
  const { config: configOverride, logger: loggerOverride, ...rest } = options;
  const config = configOverride ?? loadConfig();
  const logger = (loggerOverride ?? createLogger({ level: config.logLevel })).child({
    component: 'convert',
  });
  const parsed = parseParameter(conversionOptionsSchema, rest, 'conversion options');
  const supersampling = parsed.supersampling ?? config.supersampling;
  const imageOptions: ProjectionImageOptions = {
    rowChunks: config.rowChunks,
    blendMargin: degreesToRadians(config.blendMarginDegrees),
  };

  const started = performance.now();
  const source = createProjectionImage(request.source, request.image, imageOptions);
  const destinationDescriptor = parseParameter(
    projectionDescriptorSchema,
    request.destination,
    'projection',
  );
  const size = resolveDestinationSize(destinationDescriptor, request.image, parsed);

  const destination = createProjectionImage(
    scaleDescriptor(destinationDescriptor, size, supersampling),
    createPixelBuffer(size.width * supersampling, size.height * supersampling),
    imageOptions,
  );

  let map = destination.getCoordinateMap();
  for (const angles of parsed.rotations) {
    map = Rotation.fromAngles(angles).rotate(map);
  }
  const result = downsamplePixelBuffer(source.processCoordinateMap(map), supersampling);

  logger.debug('converted image', {
    from: request.source.type,
    to: destinationDescriptor.type,
    sourceWidth: request.image.width,
    sourceHeight: request.image.height,
    width: result.width,
    height: result.height,
    supersampling,
    rotations: parsed.rotations.length,
    ms: Math.round((performance.now() - started) * 10) / 10,
  });

  return result;
}

// ---------------------------------------------------------------------------
// The three conversions
// ---------------------------------------------------------------------------

/** Camera or double photo to another camera or double photo. */
export function alterPhoto(
  image: PixelBuffer,
  source: PhotoDescriptorInput,
  destination: PhotoDescriptorInput,
  options: ConvertOptions = {},
): PixelBuffer {
  return convertImage({ image, source, destination }, options);
}

/** Camera or double photo to an equirectangular panorama. */
export function makePanorama(
  image: PixelBuffer,
  source: PhotoDescriptorInput,
  options: ConvertOptions = {},
): PixelBuffer {
  return convertImage({ image, source, destination: { type: 'panorama' } }, options);
}

/** Equirectangular panorama to a camera or double photo. */
export function makePhoto(
  panorama: PixelBuffer,
  destination: PhotoDescriptorInput,
  options: ConvertOptions = {},
): PixelBuffer {
  return convertImage({ image: panorama, source: { type: 'panorama' }, destination }, options);
}

export interface PhotoSizeOptions {
  /** Also keep the panorama's vertical resolution, taking the larger size. */
  preserveVertical?: boolean;
}

/**
 * Diameter of a photo that keeps the horizontal resolution of a panorama
 * `panoramaWidth` pixels wide, for a lens covering a full sphere.
 *
 * Throws LensDomainError for lenses that stop short of π.
 */
export function suggestPhotoSize(
  panoramaWidth: number,
  lens: Lens | LensName,
  options: PhotoSizeOptions = {},
): number {
  const model = getLens(lens);
  const ratio = model.forward(Math.PI) / model.forward(Math.PI / 2);
  const horizontal = Math.ceil((panoramaWidth / Math.PI) * ratio);
  if (!options.preserveVertical) return horizontal;

  const smallSide = 1 / (ratio > 0.5 ? 1 - ratio : ratio);
  const vertical = Math.abs(Math.ceil((panoramaWidth / 2) * smallSide));
  return Math.max(horizontal, vertical);
}
