/**
 * Error taxonomy for the sparse model codec.
 *
 * - RecordConstructionError: a record violates its own shape (arity, ranges).
 * - FormatError: a file on disk cannot be decoded.
 * - ReferentialError: a record points at an id that does not exist.
 * - IOError: the filesystem refused a read or write.
 */

export type RecordKind = 'camera' | 'image' | 'point3D'

/** A record failed validation when it was built. */
export class RecordConstructionError extends Error {
  constructor(
    public readonly entity: RecordKind,
    public readonly issues: readonly string[],
  ) {
    super(`Invalid ${entity}: ${issues.join('; ')}`)
    this.name = 'RecordConstructionError'
  }
}

/** Malformed input: truncated data, count mismatch, unknown model, bad token. */
export class FormatError extends Error {
  constructor(
    public readonly file: string,
    public readonly offset: number,
    public readonly detail: string,
  ) {
    super(`${file} @ byte ${offset}: ${detail}`)
    this.name = 'FormatError'
  }
}

/** A record references a camera, image or point that is not in the model. */
export class ReferentialError extends Error {
  constructor(
    public readonly entity: RecordKind,
    public readonly id: number,
    public readonly reference: string,
  ) {
    super(`${entity} ${id} references ${reference}`)
    this.name = 'ReferentialError'
  }
}

/** Directory or file access failed. */
export class IOError extends Error {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`I/O failure on ${path}: ${reason}`, { cause })
    this.name = 'IOError'
  }
}
