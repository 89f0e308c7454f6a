import { z } from 'zod'

const angleSchema = z.number().finite()

/** `[pitch, yaw, roll]` in radians. */
export const rotationAnglesSchema = z.tuple([angleSchema, angleSchema, angleSchema])

export const conversionOptionsSchema = z.object({
  rotations: z.array(rotationAnglesSchema).default([]),
  supersampling: z.number().int().min(1).max(16).optional(),
  height: z.number().int().positive().optional(),
  width: z.number().int().positive().optional(),
})

export type RotationAngles = z.infer<typeof rotationAnglesSchema>
export type ConversionOptions = z.infer<typeof conversionOptionsSchema>
export type ConversionOptionsInput = z.input<typeof conversionOptionsSchema>
