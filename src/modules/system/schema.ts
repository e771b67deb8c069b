import { z } from 'zod'

export const HealthResponseSchema = z.object({
  status: z.literal('ok'),
})

const RoomSnapshotSchema = z.object({
  id: z.string(),
  name: z.string().nullable(),
  reachable: z.boolean().nullable(),
  measuredTemperature: z.number().nullable(),
  setpointTemperature: z.number().nullable(),
  setpointMode: z.string().nullable(),
  heatingPowerRequest: z.number().nullable(),
  openWindow: z.boolean().nullable(),
  moduleIds: z.array(z.string()),
})

const ModuleSnapshotSchema = z.object({
  id: z.string(),
  type: z.string(),
  name: z.string().nullable(),
  roomId: z.string().nullable(),
  reachable: z.boolean().nullable(),
  boilerStatus: z.boolean().nullable(),
  batteryState: z.string().nullable(),
})

export const StatusResponseSchema = z.object({
  uptimeSeconds: z.number(),
  homeId: z.string(),
  poller: z.object({
    running: z.boolean(),
    state: z.enum(['idle', 'in-flight']),
    intervalSeconds: z.number(),
    cycles: z.number(),
    failures: z.number(),
    skipped: z.number(),
    lastSuccessAt: z.string().nullable(),
    lastErrorAt: z.string().nullable(),
    lastError: z.string().nullable(),
  }),
  broker: z.object({
    connected: z.boolean(),
    brokerUrl: z.string(),
    topic: z.string(),
    published: z.number(),
    lastPublishedAt: z.string().nullable(),
  }),
  watchdog: z.object({
    enabled: z.boolean(),
    rooms: z.array(
      z.object({
        roomId: z.string(),
        roomName: z.string().nullable(),
        initialTemperature: z.number(),
        rounds: z.number(),
        startedAt: z.string(),
      })
    ),
  }),
  snapshot: z
    .object({
      homeId: z.string(),
      homeName: z.string().nullable(),
      fetchedAt: z.string(),
      rooms: z.array(RoomSnapshotSchema),
      modules: z.array(ModuleSnapshotSchema),
    })
    .nullable(),
})
