import { z } from 'zod'
import { ThermostatModeSchema } from '../netatmo/schema'

export { AckResponseSchema, HomeStatusResponseSchema, HomesDataResponseSchema } from '../netatmo/schema'

export const SetModeQuerySchema = z.object({
  mode: ThermostatModeSchema,
})

export const RoomParamsSchema = z.object({
  room_id: z.string().trim().min(1),
})

// Plain decimal notation only (21.5, -3); blank, hex and exponent forms are rejected
const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/

export const TrueTemperatureQuerySchema = z.object({
  corrected_temperature: z
    .string()
    .trim()
    .regex(DECIMAL_PATTERN, 'Expected a decimal number such as 21.5')
    .pipe(z.coerce.number().finite()),
})

