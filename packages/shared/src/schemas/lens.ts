import { z } from 'zod'

export const LENS_NAMES = [
  'rectilinear',
  'equisolid',
  'equidistant',
  'orthographic',
  'stereographic',
  'thoby',
] as const

export const lensNameSchema = z.enum(LENS_NAMES)

export type LensName = z.infer<typeof lensNameSchema>
