// Types
export type {
  CameraModelName, CameraModelSpec,
  Camera, PosedImage, Point3D, SparseModel,
  Vec2Tuple, Vec3Tuple, QuatTuple, Rgb,
  ModelEncoding, ModelFileKind,
} from './types.js'

export {
  CAMERA_MODELS, CAMERA_MODEL_NAMES, INVALID_POINT3D_ID,
  MODEL_ENCODINGS, MODEL_FILES,
  isCameraModelName, cameraModelByCode, encodingExtension, sortedById,
} from './types.js'

// Errors
export {
  RecordConstructionError, FormatError, ReferentialError, IOError,
  type RecordKind,
} from './errors.js'

// Records
export {
  createCamera, createPosedImage, createPoint3D,
  cameraSchema, posedImageSchema, point3DSchema, imageNameSchema, QVEC_NORM_TOLERANCE,
  type CameraInput, type PosedImageInput, type Point3DInput,
} from './records.js'

// Validation
export { validateModel } from './validate.js'

// Text encoding
export { encodeCamerasText, encodeImagesText, encodePointsText, formatReal } from './text-encoder.js'
export { decodeCamerasText, decodeImagesText, decodePointsText, decodeUtf8Text } from './text-decoder.js'

// Binary encoding
export {
  encodeCamerasBinary, encodeImagesBinary, encodePointsBinary,
  camerasBinarySize, imagesBinarySize, pointsBinarySize,
} from './binary-encoder.js'
export { decodeCamerasBinary, decodeImagesBinary, decodePointsBinary, ByteReader } from './binary-decoder.js'

// Directory io
export {
  writeModel, writeModelMaps, readModel, detectModelEncoding, modelFilePaths,
  type ModelFilePaths,
} from './model-io.js'
