// ---------------------------------------------------------------------------
// Dataset export: cameras, rendered images and sampled points -> model dir
//
// Layout under the output directory:
//   images/<name>.<format>     one file per rendered frame
//   sparse/0/{cameras,images,points3D}.{bin,txt}
// ---------------------------------------------------------------------------

import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import {
  IOError,
  createPosedImage,
  imageNameSchema,
  writeModel,
  type Camera,
  type Point3D,
  type PosedImage,
} from '@sfm-export/sparse-model';

import { ExportError } from './errors.js';
import { buildCamera, renderResolution } from './intrinsics.js';
import { silentLogger, type Logger } from './logger.js';
import { withModifierEnabled } from './modifier-guard.js';
import type { ExportOptions } from './options.js';
import { samplePoints } from './point-sampling.js';
import { convertPose } from './pose.js';
import type {
  ExportSummary,
  FrameRenderer,
  HostCamera,
  HostScene,
  PointSampleStream,
  PointSource,
} from './types.js';

export interface ExportHooks {
  logger?: Logger;
  /** Called after every rendered frame with the completed share in [0, 100]. */
  onProgress?: (percent: number) => void;
}

// ---------------------------------------------------------------------------
// Frames and file names
// ---------------------------------------------------------------------------

/**
 * Frames to render for a camera: its keyframes in ascending order without
 * duplicates, or only the current frame when keyframes are disabled or the
 * camera has none.
 */
export function selectFrames(
  camera: Pick<HostCamera, 'keyframes'>,
  currentFrame: number,
  keyframesOnly: boolean,
): number[] {
  if (!keyframesOnly || camera.keyframes.length === 0) return [currentFrame];
  return [...new Set(camera.keyframes)].sort((a, b) => a - b);
}

function padFrame(frame: number): string {
  return frame < 0 ? '-' + String(-frame).padStart(3, '0') : String(frame).padStart(4, '0');
}

/** `<camera>_frame_0012.png` when a camera renders several frames, `<camera>.png` otherwise. */
export function imageFileName(
  cameraName: string,
  frame: number,
  format: string,
  multiFrame: boolean,
): string {
  return multiFrame
    ? `${cameraName}_frame_${padFrame(frame)}.${format}`
    : `${cameraName}.${format}`;
}

function byName(a: HostCamera, b: HostCamera): number {
  if (a.name < b.name) return -1;
  return a.name > b.name ? 1 : 0;
}

// ---------------------------------------------------------------------------
// Render plan
// ---------------------------------------------------------------------------

interface PlannedRender {
  cameraId: number;
  camera: HostCamera;
  frame: number;
  imageName: string;
}

/** Every render of the export, cameras numbered from 1 in name order. */
function planRenders(scene: HostScene, options: ExportOptions): PlannedRender[] {
  return [...scene.cameras].sort(byName).flatMap((camera, index) => {
    const frames = selectFrames(camera, scene.currentFrame, options.keyframesOnly);
    const multiFrame = options.keyframesOnly && frames.length > 1;
    return frames.map((frame) => ({
      cameraId: index + 1,
      camera,
      frame,
      imageName: imageFileName(camera.name, frame, options.imageFormat, multiFrame),
    }));
  });
}

function quoteAll(names: Iterable<string>): string {
  return [...names].map((name) => JSON.stringify(name)).join(', ');
}

/** Image names join the model to the rendered files: each must be a plain file name used once. */
function checkImageNames(renders: readonly PlannedRender[]): void {
  const invalid = new Set<string>();
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const { imageName } of renders) {
    if (!imageNameSchema.safeParse(imageName).success) invalid.add(imageName);
    if (seen.has(imageName)) duplicates.add(imageName);
    seen.add(imageName);
  }
  if (invalid.size > 0) {
    throw new ExportError(`Invalid image names: ${quoteAll(invalid)}`);
  }
  if (duplicates.size > 0) {
    throw new ExportError(`Duplicate image names: ${quoteAll(duplicates)}`);
  }
}

async function ensureDir(dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
  } catch (err) {
    throw new IOError(dir, err);
  }
}

// ---------------------------------------------------------------------------
// Points
// ---------------------------------------------------------------------------

async function sampleSource(source: PointSource): Promise<PointSampleStream> {
  return source.modifier
    ? withModifierEnabled(source.modifier, () => source.sample())
    : source.sample();
}

/** Sample every source in order; ids continue from one source to the next. */
async function collectPoints(
  sources: readonly PointSource[],
  logger: Logger,
): Promise<Map<number, Point3D>> {
  const points = new Map<number, Point3D>();
  let nextId = 1;
  for (const source of sources) {
    const sampled = samplePoints(await sampleSource(source), nextId);
    for (const point of sampled) points.set(point.id, point);
    nextId += sampled.length;
    logger.debug('points sampled', { source: source.name, count: sampled.length });
  }
  return points;
}

// ---------------------------------------------------------------------------
// exportDataset
// ---------------------------------------------------------------------------

/**
 * Export the scene as a reconstruction dataset: render every selected
 * frame of every camera and write the matching sparse model.
 *
 * Cameras are numbered from 1 in name order and images from 1 in render
 * order. Renderer failures propagate unchanged.
 *
 * @throws ExportError when the scene has no cameras, or when an image name
 *   is not a plain file name or is planned twice; nothing is written.
 */
export async function exportDataset(
  scene: HostScene,
  options: ExportOptions,
  renderer: FrameRenderer,
  hooks: ExportHooks = {},
): Promise<ExportSummary> {
  const logger = hooks.logger ?? silentLogger;

  if (scene.cameras.length === 0) {
    throw new ExportError('No cameras found in scene');
  }
  const resolution = renderResolution(scene.resolution);
  const renders = planRenders(scene, options);
  checkImageNames(renders);

  const cameras = new Map<number, Camera>();
  for (const { cameraId, camera } of renders) {
    if (!cameras.has(cameraId)) {
      cameras.set(cameraId, buildCamera(cameraId, options.cameraModel, camera.lens, resolution));
    }
  }

  const imagesDir = path.join(options.outputDir, 'images');
  const modelDir = path.join(options.outputDir, 'sparse', '0');
  await ensureDir(modelDir);
  await ensureDir(imagesDir);
  logger.info('export started', {
    outputDir: options.outputDir,
    cameras: scene.cameras.length,
    encoding: options.encoding,
  });

  const points = await collectPoints(scene.pointSources, logger);
  logger.info('points collected', { sources: scene.pointSources.length, points: points.size });

  const images = new Map<number, PosedImage>();
  for (const { cameraId, camera, frame, imageName } of renders) {
    const pose = convertPose(await camera.poseAt(frame));
    const image = createPosedImage({ id: images.size + 1, ...pose, cameraId, name: imageName });
    images.set(image.id, image);

    await renderer.render({ camera, frame, imageName, outputPath: path.join(imagesDir, imageName) });
    logger.debug('frame rendered', { camera: camera.name, frame, image: imageName });
    hooks.onProgress?.((images.size / renders.length) * 100);
  }
  logger.info('frames rendered', { images: images.size });

  await writeModel({ cameras, images, points }, modelDir, options.encoding);
  logger.info('model written', { modelDir, cameras: cameras.size, images: images.size, points: points.size });

  return {
    cameras: cameras.size,
    images: images.size,
    points: points.size,
    imagesDir,
    modelDir,
  };
}
