/**
 * Text decoder: reads the files produced by text-encoder.ts.
 *
 * Records may appear in any order with gaps between ids. Blank lines and
 * `#` comments are skipped between records; the line after an image record
 * is always its observation line, even when empty.
 */

import { FormatError, RecordConstructionError } from './errors.js'
import { createCamera, createPoint3D, createPosedImage } from './records.js'
import {
  isCameraModelName,
  type Camera, type Point3D, type PosedImage,
} from './types.js'

// ─── Bytes to text ──────────────────────────────────────────────────────────

const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })
const lenientDecoder = new TextDecoder('utf-8', { ignoreBOM: true })
const REPLACEMENT = '\uFFFD'

/** Byte offset of the first invalid sequence; U+FFFD encoded as EF BF BD is valid. */
function invalidUtf8Offset(bytes: Uint8Array): number {
  const text = lenientDecoder.decode(bytes)
  for (let i = text.indexOf(REPLACEMENT); i !== -1; i = text.indexOf(REPLACEMENT, i + 1)) {
    const at = Buffer.byteLength(text.slice(0, i), 'utf8')
    if (bytes[at] !== 0xef || bytes[at + 1] !== 0xbf || bytes[at + 2] !== 0xbd) return at
  }
  return bytes.byteLength
}

/** Decode a text model file. Throws FormatError at the first byte that is not UTF-8. */
export function decodeUtf8Text(bytes: Uint8Array, file: string): string {
  try {
    return utf8Decoder.decode(bytes)
  } catch {
    throw new FormatError(file, invalidUtf8Offset(bytes), 'not valid UTF-8')
  }
}

// ─── Line scanning ──────────────────────────────────────────────────────────

interface Line {
  text: string
  /** Byte offset of the first byte of the line. */
  offset: number
}

function splitLines(text: string): Line[] {
  const lines: Line[] = []
  let offset = 0
  for (const raw of text.split('\n')) {
    lines.push({ text: raw.endsWith('\r') ? raw.slice(0, -1) : raw, offset })
    offset += Buffer.byteLength(raw, 'utf8') + 1
  }
  return lines
}

function isRecordLine(line: Line): boolean {
  const trimmed = line.text.trim()
  return trimmed.length > 0 && !trimmed.startsWith('#')
}

const INTEGER = /^[-+]?\d+$/
const REAL = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/

/** Whitespace-separated fields of one line, consumed left to right. */
class Fields {
  private readonly tokens: string[]
  private cursor = 0

  constructor(
    private readonly file: string,
    private readonly line: Line,
  ) {
    const trimmed = line.text.trim()
    this.tokens = trimmed.length > 0 ? trimmed.split(/\s+/) : []
  }

  get remaining(): number {
    return this.tokens.length - this.cursor
  }

  fail(detail: string): never {
    throw new FormatError(this.file, this.line.offset, detail)
  }

  word(label: string): string {
    const token = this.tokens[this.cursor]
    if (token === undefined) return this.fail(`missing ${label}`)
    this.cursor++
    return token
  }

  int(label: string): number {
    const token = this.word(label)
    const value = Number(token)
    if (!INTEGER.test(token) || !Number.isSafeInteger(value)) {
      this.fail(`${label} is not an integer: "${token}"`)
    }
    return value
  }

  real(label: string): number {
    const token = this.word(label)
    if (!REAL.test(token)) this.fail(`${label} is not a number: "${token}"`)
    return Number(token)
  }

  end(): void {
    if (this.remaining > 0) {
      this.fail(`unexpected trailing field "${this.tokens[this.cursor] ?? ''}"`)
    }
  }

  /** Run a record constructor, reporting its rejection at this line. */
  build<T>(construct: () => T): T {
    try {
      return construct()
    } catch (err) {
      if (err instanceof RecordConstructionError) this.fail(err.message)
      throw err
    }
  }
}

function insertUnique<T extends { id: number }>(
  records: Map<number, T>,
  record: T,
  fields: Fields,
): void {
  if (records.has(record.id)) fields.fail(`duplicate id ${record.id}`)
  records.set(record.id, record)
}

// ─── cameras.txt ────────────────────────────────────────────────────────────

export function decodeCamerasText(text: string, file = 'cameras.txt'): Map<number, Camera> {
  const cameras = new Map<number, Camera>()

  for (const line of splitLines(text).filter(isRecordLine)) {
    const f: Fields = new Fields(file, line)
    const id = f.int('CAMERA_ID')
    const model = f.word('MODEL')
    if (!isCameraModelName(model)) f.fail(`unknown camera model "${model}"`)
    const width = f.int('WIDTH')
    const height = f.int('HEIGHT')
    const params: number[] = []
    while (f.remaining > 0) params.push(f.real('PARAM'))

    insertUnique(cameras, f.build(() => createCamera({ id, model, width, height, params })), f)
  }

  return cameras
}

// ─── images.txt ─────────────────────────────────────────────────────────────

export function decodeImagesText(text: string, file = 'images.txt'): Map<number, PosedImage> {
  const images = new Map<number, PosedImage>()
  const lines = splitLines(text)

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]
    if (line === undefined || !isRecordLine(line)) continue

    const f: Fields = new Fields(file, line)
    const id = f.int('IMAGE_ID')
    const qvec = [f.real('QW'), f.real('QX'), f.real('QY'), f.real('QZ')]
    const tvec = [f.real('TX'), f.real('TY'), f.real('TZ')]
    const cameraId = f.int('CAMERA_ID')
    const name = f.word('NAME')
    f.end()

    i++
    const obsLine = lines[i]
    if (obsLine === undefined) f.fail(`image ${id} has no observation line`)

    const obs: Fields = new Fields(file, obsLine)
    if (obs.remaining % 3 !== 0) {
      obs.fail(`observation line has ${obs.remaining} fields, expected a multiple of 3`)
    }
    const xys: [number, number][] = []
    const point3DIds: number[] = []
    while (obs.remaining > 0) {
      xys.push([obs.real('X'), obs.real('Y')])
      point3DIds.push(obs.int('POINT3D_ID'))
    }

    const image = f.build(() => createPosedImage({ id, qvec, tvec, cameraId, name, xys, point3DIds }))
    insertUnique(images, image, f)
  }

  return images
}

// ─── points3D.txt ───────────────────────────────────────────────────────────

export function decodePointsText(text: string, file = 'points3D.txt'): Map<number, Point3D> {
  const points = new Map<number, Point3D>()

  for (const line of splitLines(text).filter(isRecordLine)) {
    const f: Fields = new Fields(file, line)
    const id = f.int('POINT3D_ID')
    const xyz = [f.real('X'), f.real('Y'), f.real('Z')]
    const rgb = [f.int('R'), f.int('G'), f.int('B')]
    const error = f.real('ERROR')
    if (f.remaining % 2 !== 0) f.fail('track has an unpaired IMAGE_ID')

    const imageIds: number[] = []
    const point2DIdxs: number[] = []
    while (f.remaining > 0) {
      imageIds.push(f.int('IMAGE_ID'))
      point2DIdxs.push(f.int('POINT2D_IDX'))
    }

    insertUnique(points, f.build(() => createPoint3D({ id, xyz, rgb, error, imageIds, point2DIdxs })), f)
  }

  return points
}
