/**
 * Binary decoder: reads the layout produced by binary-encoder.ts.
 *
 * Every read is bounds-checked; running past the end, leftover bytes after
 * the declared record count, an unknown model code or an id beyond
 * Number.MAX_SAFE_INTEGER raise FormatError with the byte offset.
 */

import { FormatError, RecordConstructionError } from './errors.js'
import { createCamera, createPoint3D, createPosedImage } from './records.js'
import {
  CAMERA_MODELS, cameraModelByCode,
  type Camera, type Point3D, type PosedImage,
} from './types.js'

// ─── Cursor ─────────────────────────────────────────────────────────────────

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER)
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER)

const utf8Decoder = new TextDecoder('utf-8', { fatal: true })

export class ByteReader {
  private readonly view: DataView
  private cursor = 0

  constructor(
    private readonly bytes: Uint8Array,
    private readonly file: string,
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  get offset(): number {
    return this.cursor
  }

  get remaining(): number {
    return this.bytes.byteLength - this.cursor
  }

  fail(detail: string, at: number = this.cursor): never {
    throw new FormatError(this.file, at, detail)
  }

  /** Reserve `size` bytes and return their start offset. */
  private take(size: number, label: string): number {
    if (size > this.remaining) {
      this.fail(`truncated ${label}: need ${size} bytes, ${this.remaining} left`)
    }
    const at = this.cursor
    this.cursor += size
    return at
  }

  u8(label: string): number {
    return this.view.getUint8(this.take(1, label))
  }

  i32(label: string): number {
    return this.view.getInt32(this.take(4, label), true)
  }

  f64(label: string): number {
    return this.view.getFloat64(this.take(8, label), true)
  }

  u64(label: string): number {
    const at = this.take(8, label)
    const value = this.view.getBigUint64(at, true)
    if (value > MAX_SAFE) this.fail(`${label} ${value} exceeds ${Number.MAX_SAFE_INTEGER}`, at)
    return Number(value)
  }

  i64(label: string): number {
    const at = this.take(8, label)
    const value = this.view.getBigInt64(at, true)
    if (value > MAX_SAFE || value < MIN_SAFE) this.fail(`${label} ${value} is not a safe integer`, at)
    return Number(value)
  }

  utf8(length: number, label: string): string {
    const at = this.take(length, label)
    try {
      return utf8Decoder.decode(this.bytes.subarray(at, at + length))
    } catch {
      return this.fail(`${label} is not valid UTF-8`, at)
    }
  }

  /** All bytes must be consumed once the declared records are read. */
  end(): void {
    if (this.remaining > 0) {
      this.fail(`${this.remaining} trailing bytes after the declared record count`)
    }
  }

  /** Run a record constructor, reporting its rejection at the record start. */
  build<T>(start: number, construct: () => T): T {
    try {
      return construct()
    } catch (err) {
      if (err instanceof RecordConstructionError) this.fail(err.message, start)
      throw err
    }
  }
}

function insertUnique<T extends { id: number }>(
  records: Map<number, T>,
  record: T,
  reader: ByteReader,
  start: number,
): void {
  if (records.has(record.id)) reader.fail(`duplicate id ${record.id}`, start)
  records.set(record.id, record)
}

function readF64s(reader: ByteReader, labels: readonly string[]): number[] {
  return labels.map((label) => reader.f64(label))
}

// ─── cameras.bin ────────────────────────────────────────────────────────────

export function decodeCamerasBinary(bytes: Uint8Array, file = 'cameras.bin'): Map<number, Camera> {
  const reader: ByteReader = new ByteReader(bytes, file)
  const cameras = new Map<number, Camera>()

  const count = reader.u64('camera count')
  for (let i = 0; i < count; i++) {
    const start = reader.offset
    const id = reader.u64('camera id')
    const codeAt = reader.offset
    const code = reader.i32('model code')
    const model = cameraModelByCode(code)
    if (model === undefined) return reader.fail(`unknown camera model code ${code}`, codeAt)
    const width = reader.u64('width')
    const height = reader.u64('height')
    const params = readF64s(reader, CAMERA_MODELS[model].params)

    insertUnique(cameras, reader.build(start, () => createCamera({ id, model, width, height, params })), reader, start)
  }

  reader.end()
  return cameras
}

// ─── images.bin ─────────────────────────────────────────────────────────────

export function decodeImagesBinary(bytes: Uint8Array, file = 'images.bin'): Map<number, PosedImage> {
  const reader: ByteReader = new ByteReader(bytes, file)
  const images = new Map<number, PosedImage>()

  const count = reader.u64('image count')
  for (let i = 0; i < count; i++) {
    const start = reader.offset
    const id = reader.u64('image id')
    const qvec = readF64s(reader, ['qw', 'qx', 'qy', 'qz'])
    const tvec = readF64s(reader, ['tx', 'ty', 'tz'])
    const cameraId = reader.u64('camera id')
    const name = reader.utf8(reader.u64('name length'), 'name')

    const observations = reader.u64('observation count')
    const xys: [number, number][] = []
    const point3DIds: number[] = []
    for (let j = 0; j < observations; j++) {
      xys.push([reader.f64('x'), reader.f64('y')])
      point3DIds.push(reader.i64('point3D id'))
    }

    const image = reader.build(start, () => createPosedImage({ id, qvec, tvec, cameraId, name, xys, point3DIds }))
    insertUnique(images, image, reader, start)
  }

  reader.end()
  return images
}

// ─── points3D.bin ───────────────────────────────────────────────────────────

export function decodePointsBinary(bytes: Uint8Array, file = 'points3D.bin'): Map<number, Point3D> {
  const reader: ByteReader = new ByteReader(bytes, file)
  const points = new Map<number, Point3D>()

  const count = reader.u64('point count')
  for (let i = 0; i < count; i++) {
    const start = reader.offset
    const id = reader.u64('point id')
    const xyz = readF64s(reader, ['x', 'y', 'z'])
    const rgb = [reader.u8('r'), reader.u8('g'), reader.u8('b')]
    const error = reader.f64('error')

    const trackLength = reader.u64('track length')
    const imageIds: number[] = []
    const point2DIdxs: number[] = []
    for (let j = 0; j < trackLength; j++) {
      imageIds.push(reader.u64('track image id'))
      point2DIdxs.push(reader.i64('track point2D idx'))
    }

    const point = reader.build(start, () => createPoint3D({ id, xyz, rgb, error, imageIds, point2DIdxs }))
    insertUnique(points, point, reader, start)
  }

  reader.end()
  return points
}
