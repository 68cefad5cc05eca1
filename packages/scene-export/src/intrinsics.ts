// ---------------------------------------------------------------------------
// Camera intrinsics from lens, sensor and render resolution
// ---------------------------------------------------------------------------

import { createCamera, type Camera, type CameraModelName } from '@sfm-export/sparse-model';

import type { LensSpec, Resolution, ResolutionSettings } from './types.js';

/** Output size after the percentage scale, truncated to whole pixels. */
export function renderResolution(settings: ResolutionSettings): Resolution {
  const width = Math.floor((settings.x * settings.percentage) / 100);
  const height = Math.floor((settings.y * settings.percentage) / 100);
  if (width < 1 || height < 1) {
    throw new RangeError(
      `Render resolution ${settings.x}x${settings.y} at ${settings.percentage}% is empty`,
    );
  }
  return { width, height };
}

/**
 * Param vector for `model`, assuming a centred principal point and no lens
 * distortion. Single-focal models take fx.
 */
export function cameraParams(
  lens: LensSpec,
  resolution: Resolution,
  model: CameraModelName,
): number[] {
  const fx = (lens.lensMm * resolution.width) / lens.sensorWidthMm;
  const fy = (lens.lensMm * resolution.height) / lens.sensorHeightMm;
  const cx = resolution.width / 2;
  const cy = resolution.height / 2;

  switch (model) {
    case 'PINHOLE':
      return [fx, fy, cx, cy];
    case 'OPENCV':
      return [fx, fy, cx, cy, 0, 0, 0, 0];
    case 'SIMPLE_PINHOLE':
      return [fx, cx, cy];
    case 'SIMPLE_RADIAL':
      return [fx, cx, cy, 0];
    case 'RADIAL':
      return [fx, cx, cy, 0, 0];
  }
}

export function buildCamera(
  id: number,
  model: CameraModelName,
  lens: LensSpec,
  resolution: Resolution,
): Camera {
  return createCamera({
    id,
    model,
    width: resolution.width,
    height: resolution.height,
    params: cameraParams(lens, resolution, model),
  });
}
