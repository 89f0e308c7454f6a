import { z } from 'zod'
import { lensNameSchema } from './lens.js'

const FULL_TURN = 2 * Math.PI

export const CAMERA_LAYOUTS = ['inscribed', 'cropped', 'full-frame'] as const

/** How the valid image circle sits on a single-sensor canvas. */
export const cameraLayoutSchema = z.enum(CAMERA_LAYOUTS)

/** Field of view in radians, (0, 2π]. */
export const fovSchema = z
  .number()
  .finite()
  .gt(0, 'Field of view must be greater than 0')
  .max(FULL_TURN, 'Field of view cannot exceed 360 degrees')

/** Per-sensor field of view of a double image, [π, 2π]. */
export const sensorFovSchema = z
  .number()
  .finite()
  .min(Math.PI, 'Each sensor of a double image must cover at least 180 degrees')
  .max(FULL_TURN, 'Field of view cannot exceed 360 degrees')

export const cameraDescriptorSchema = z.object({
  type: z.literal('camera'),
  layout: cameraLayoutSchema.default('inscribed'),
  lens: lensNameSchema,
  fov: fovSchema,
  magnitude: z.number().finite().positive().optional(),
})

export const doubleCameraDescriptorSchema = z.object({
  type: z.literal('double'),
  lens: lensNameSchema,
  fov: sensorFovSchema,
  magnitude: z.number().finite().positive().optional(),
})

export const panoramaDescriptorSchema = z.object({
  type: z.literal('panorama'),
})

export const projectionDescriptorSchema = z.discriminatedUnion('type', [
  cameraDescriptorSchema,
  doubleCameraDescriptorSchema,
  panoramaDescriptorSchema,
])

export type CameraLayout = z.infer<typeof cameraLayoutSchema>
export type CameraDescriptor = z.infer<typeof cameraDescriptorSchema>
export type DoubleCameraDescriptor = z.infer<typeof doubleCameraDescriptorSchema>
export type PanoramaDescriptor = z.infer<typeof panoramaDescriptorSchema>
export type ProjectionDescriptor = z.infer<typeof projectionDescriptorSchema>
export type ProjectionDescriptorInput = z.input<typeof projectionDescriptorSchema>
