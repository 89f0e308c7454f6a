export { LENS_NAMES, lensNameSchema, type LensName } from './lens.js'

export {
  CAMERA_LAYOUTS,
  cameraLayoutSchema,
  fovSchema,
  sensorFovSchema,
  cameraDescriptorSchema,
  doubleCameraDescriptorSchema,
  panoramaDescriptorSchema,
  projectionDescriptorSchema,
  type CameraLayout,
  type CameraDescriptor,
  type DoubleCameraDescriptor,
  type PanoramaDescriptor,
  type ProjectionDescriptor,
  type ProjectionDescriptorInput,
} from './projection.js'

export {
  rotationAnglesSchema,
  conversionOptionsSchema,
  type RotationAngles,
  type ConversionOptions,
  type ConversionOptionsInput,
} from './conversion.js'

export {
  degreesToRadians,
  radiansToDegrees,
  fovDegreesSchema,
  sensorFovDegreesSchema,
  rotationDegreesSchema,
  projectionRequestSchema,
  type ProjectionRequest,
} from './degrees.js'
