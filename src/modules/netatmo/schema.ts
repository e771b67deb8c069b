import { z } from 'zod'

// --- Inputs ---
export const THERMOSTAT_MODES = ['schedule', 'away', 'hg'] as const

export const ThermostatModeSchema = z.enum(THERMOSTAT_MODES)

// --- OAuth ---
export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_in: z.number().positive(),
  scope: z.array(z.string()).optional(),
})

// API errors carry { error: { code, message } }, the token endpoint { error: 'invalid_grant' }
export const NetatmoErrorBodySchema = z.object({
  error: z.union([
    z.object({
      code: z.number(),
      message: z.string(),
    }),
    z.string(),
  ]),
  error_description: z.string().optional(),
})

// --- homestatus ---
export const RoomStatusSchema = z
  .object({
    id: z.string(),
    reachable: z.boolean().optional(),
    therm_measured_temperature: z.number().optional(),
    therm_setpoint_temperature: z.number().optional(),
    therm_setpoint_mode: z.string().optional(),
    therm_setpoint_end_time: z.number().optional(),
    heating_power_request: z.number().optional(),
    anticipating: z.boolean().optional(),
    open_window: z.boolean().optional(),
  })
  .passthrough()

export const ModuleStatusSchema = z
  .object({
    id: z.string(),
    type: z.string(),
    reachable: z.boolean().optional(),
    boiler_status: z.boolean().optional(),
    battery_state: z.string().optional(),
    battery_level: z.number().optional(),
    rf_strength: z.number().optional(),
    wifi_strength: z.number().optional(),
    firmware_revision: z.number().optional(),
    bridge: z.string().optional(),
  })
  .passthrough()

export const HomeStatusResponseSchema = z.object({
  status: z.string(),
  time_server: z.number().optional(),
  body: z.object({
    home: z.object({
      id: z.string(),
      rooms: z.array(RoomStatusSchema).default([]),
      modules: z.array(ModuleStatusSchema).default([]),
    }),
  }),
})

export type HomeStatusResponse = z.infer<typeof HomeStatusResponseSchema>

// --- homesdata ---
export const HomesDataResponseSchema = z.object({
  status: z.string(),
  time_server: z.number().optional(),
  body: z.object({
    homes: z
      .array(
        z.object({
          id: z.string(),
          name: z.string().optional(),
          therm_mode: z.string().optional(),
          rooms: z
            .array(
              z.object({
                id: z.string(),
                name: z.string().optional(),
                type: z.string().optional(),
                module_ids: z.array(z.string()).default([]),
              })
            )
            .default([]),
          modules: z
            .array(
              z.object({
                id: z.string(),
                type: z.string(),
                name: z.string().optional(),
                room_id: z.string().optional(),
                bridge: z.string().optional(),
              })
            )
            .default([]),
        })
      )
      .default([]),
  }),
})

export type HomesDataResponse = z.infer<typeof HomesDataResponseSchema>

// --- write acknowledgements ---
export const AckResponseSchema = z.object({
  status: z.string(),
  time_server: z.number().optional(),
})

export type AckResponse = z.infer<typeof AckResponseSchema>
