import { z } from 'zod'
import { lensNameSchema } from './lens.js'
import { cameraLayoutSchema } from './projection.js'
import type { RotationAngles } from './conversion.js'

// ─── Degree-based input ─────────────────────────────────────────────────────
// People type angles in degrees; the engine works in radians.

export function degreesToRadians(degrees: number): number {
  return (degrees / 180) * Math.PI
}

export function radiansToDegrees(radians: number): number {
  return (radians / Math.PI) * 180
}

export const fovDegreesSchema = z
  .number()
  .finite()
  .gt(0, 'Field of view must be greater than 0')
  .max(360, 'The field of view of an image cannot be higher than 360 degrees')
  .transform(degreesToRadians)

export const sensorFovDegreesSchema = z
  .number()
  .finite()
  .min(180, 'The field of view of a double image cannot be smaller than 180 degrees')
  .max(360, 'The field of view of an image cannot be higher than 360 degrees')
  .transform(degreesToRadians)

const degreeSchema = z.number().finite()

export const rotationDegreesSchema = z
  .tuple([degreeSchema, degreeSchema, degreeSchema])
  .transform(([pitch, yaw, roll]): RotationAngles => [
    degreesToRadians(pitch),
    degreesToRadians(yaw),
    degreesToRadians(roll),
  ])

export const projectionRequestSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('camera'),
    layout: cameraLayoutSchema.default('inscribed'),
    lens: lensNameSchema,
    fov: fovDegreesSchema,
  }),
  z.object({
    type: z.literal('double'),
    lens: lensNameSchema,
    fov: sensorFovDegreesSchema,
  }),
  z.object({
    type: z.literal('panorama'),
  }),
])

export type ProjectionRequest = z.input<typeof projectionRequestSchema>
