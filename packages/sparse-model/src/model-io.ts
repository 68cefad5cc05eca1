/**
 * Directory-level read/write of a sparse model.
 *
 * A model directory holds exactly three files, `cameras`, `images` and
 * `points3D`, all with the extension of one encoding. Writes are
 * all-or-nothing with respect to validation: every reference is checked and
 * every file is encoded in memory before the filesystem is touched. All three
 * files are staged as temp files and renamed into place only once every write
 * has succeeded, so a reader never sees a half-written file.
 */

import { access, mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import path from 'node:path'

import { decodeCamerasBinary, decodeImagesBinary, decodePointsBinary } from './binary-decoder.js'
import { encodeCamerasBinary, encodeImagesBinary, encodePointsBinary } from './binary-encoder.js'
import { IOError } from './errors.js'
import { decodeCamerasText, decodeImagesText, decodePointsText, decodeUtf8Text } from './text-decoder.js'
import { encodeCamerasText, encodeImagesText, encodePointsText } from './text-encoder.js'
import {
  MODEL_FILES, encodingExtension,
  type Camera, type ModelEncoding, type ModelFileKind, type Point3D, type PosedImage, type SparseModel,
} from './types.js'
import { validateModel } from './validate.js'

export type ModelFilePaths = Record<ModelFileKind, string>

export function modelFilePaths(directory: string, encoding: ModelEncoding): ModelFilePaths {
  const ext = encodingExtension(encoding)
  return {
    cameras: path.join(directory, MODEL_FILES.cameras + ext),
    images: path.join(directory, MODEL_FILES.images + ext),
    points: path.join(directory, MODEL_FILES.points + ext),
  }
}

// ─── Encoding dispatch ──────────────────────────────────────────────────────

type EncodedModel = Record<ModelFileKind, string | Uint8Array>

function encodeModel(model: SparseModel, encoding: ModelEncoding): EncodedModel {
  switch (encoding) {
    case 'text':
      return {
        cameras: encodeCamerasText(model.cameras),
        images: encodeImagesText(model.images),
        points: encodePointsText(model.points),
      }
    case 'binary':
      return {
        cameras: encodeCamerasBinary(model.cameras),
        images: encodeImagesBinary(model.images),
        points: encodePointsBinary(model.points),
      }
  }
}

function decodeModel(
  files: Record<ModelFileKind, Buffer>,
  paths: ModelFilePaths,
  encoding: ModelEncoding,
): SparseModel {
  switch (encoding) {
    case 'text':
      return {
        cameras: decodeCamerasText(decodeUtf8Text(files.cameras, paths.cameras), paths.cameras),
        images: decodeImagesText(decodeUtf8Text(files.images, paths.images), paths.images),
        points: decodePointsText(decodeUtf8Text(files.points, paths.points), paths.points),
      }
    case 'binary':
      return {
        cameras: decodeCamerasBinary(files.cameras, paths.cameras),
        images: decodeImagesBinary(files.images, paths.images),
        points: decodePointsBinary(files.points, paths.points),
      }
  }
}

// ─── Write ──────────────────────────────────────────────────────────────────

const tempPathOf = (target: string): string => `${target}.tmp`

/**
 * Write every file to its temp path, then rename them all into place. A
 * failed write removes every temp staged so far, the failed one included, and
 * leaves existing files as they were.
 */
async function writeStaged(files: readonly (readonly [string, string | Uint8Array])[]): Promise<void> {
  const staged: string[] = []
  for (const [target, data] of files) {
    const tempPath = tempPathOf(target)
    staged.push(tempPath)
    try {
      await writeFile(tempPath, data)
    } catch (err) {
      await Promise.all(staged.map((file) => rm(file, { force: true })))
      throw new IOError(target, err)
    }
  }

  for (const [target] of files) {
    try {
      await rename(tempPathOf(target), target)
    } catch (err) {
      throw new IOError(target, err)
    }
  }
}

/**
 * Validate, encode and write the model into `directory` (created if needed).
 *
 * @throws ReferentialError before anything is created when a reference dangles.
 * @throws IOError when the directory or a file cannot be written.
 */
export async function writeModel(
  model: SparseModel,
  directory: string,
  encoding: ModelEncoding,
): Promise<ModelFilePaths> {
  validateModel(model)
  const encoded = encodeModel(model, encoding)
  const paths = modelFilePaths(directory, encoding)

  try {
    await mkdir(directory, { recursive: true })
  } catch (err) {
    throw new IOError(directory, err)
  }

  await writeStaged([
    [paths.cameras, encoded.cameras],
    [paths.images, encoded.images],
    [paths.points, encoded.points],
  ])

  return paths
}

/** Three-map form of writeModel. */
export function writeModelMaps(
  cameras: ReadonlyMap<number, Camera>,
  images: ReadonlyMap<number, PosedImage>,
  points: ReadonlyMap<number, Point3D>,
  directory: string,
  encoding: ModelEncoding,
): Promise<ModelFilePaths> {
  return writeModel({ cameras, images, points }, directory, encoding)
}

// ─── Read ───────────────────────────────────────────────────────────────────

async function readBytes(file: string): Promise<Buffer> {
  try {
    return await readFile(file)
  } catch (err) {
    throw new IOError(file, err)
  }
}

async function exists(file: string): Promise<boolean> {
  try {
    await access(file)
    return true
  } catch {
    return false
  }
}

/** The encoding whose three files are all present; binary wins when both are. */
export async function detectModelEncoding(directory: string): Promise<ModelEncoding | undefined> {
  for (const encoding of ['binary', 'text'] as const) {
    const paths = modelFilePaths(directory, encoding)
    const present = await Promise.all(Object.values(paths).map(exists))
    if (present.every(Boolean)) return encoding
  }
  return undefined
}

/**
 * Read the three files of `directory`. Without an explicit encoding the
 * directory's contents decide.
 *
 * @throws IOError when a file is missing or unreadable.
 * @throws FormatError when a file is malformed.
 */
export async function readModel(directory: string, encoding?: ModelEncoding): Promise<SparseModel> {
  const resolved = encoding ?? await detectModelEncoding(directory)
  if (resolved === undefined) {
    throw new IOError(directory, new Error('no complete cameras/images/points3D triple found'))
  }

  const paths = modelFilePaths(directory, resolved)
  const files = {
    cameras: await readBytes(paths.cameras),
    images: await readBytes(paths.images),
    points: await readBytes(paths.points),
  }
  return decodeModel(files, paths, resolved)
}
