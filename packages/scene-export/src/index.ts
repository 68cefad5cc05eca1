// ---------------------------------------------------------------------------
// @sfm-export/scene-export: barrel export
// ---------------------------------------------------------------------------

export type {
  Vector3,
  Quaternion,
  Mat3,
  Mat4,
  RowMajorMat3,
  EulerOrder,
  EulerAngles,
  HostRotation,
  HostPose,
  ModelPose,
  LensSpec,
  ResolutionSettings,
  Resolution,
  PointSampleStream,
  ModifierState,
  PointSource,
  HostCamera,
  HostScene,
  RenderRequest,
  FrameRenderer,
  ExportSummary,
} from './types.js';

export {
  IDENTITY_QUAT,
  quatMultiply,
  quatNormalize,
  quatToMat3,
  mat3ToQuat,
  axisAngleToQuat,
  eulerToQuat,
  mat3Transpose,
  mat3MulVec3,
  rowMajorToMat3,
  transformPoint,
} from './math.js';

export {
  AXIS_CORRECTION_QVEC,
  hostRotationToQuaternion,
  qvecToMat3,
  convertPose,
  cameraCenter,
  worldToCamera,
} from './pose.js';

export { renderResolution, cameraParams, buildCamera } from './intrinsics.js';
export { DEFAULT_POINT_RGB, quantizeColorChannel, samplePoints } from './point-sampling.js';
export { withModifierEnabled } from './modifier-guard.js';

export {
  exportOptionsSchema,
  parseExportOptions,
  type ExportOptions,
  type ExportOptionsInput,
} from './options.js';
export { ExportError, ExportOptionsError, type OptionFieldErrors } from './errors.js';

export {
  createLogger,
  silentLogger,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogFields,
} from './logger.js';

export {
  selectFrames,
  imageFileName,
  exportDataset,
  type ExportHooks,
} from './export-dataset.js';
