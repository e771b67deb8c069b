import type { HomeStatusResponse, HomesDataResponse } from './schema'

export interface HomeTopology {
  homeId: string
  name: string | null
  rooms: Map<string, { name: string | null; moduleIds: string[] }>
  modules: Map<string, { name: string | null; type: string; roomId: string | null }>
}

export interface RoomSnapshot {
  id: string
  name: string | null
  reachable: boolean | null
  measuredTemperature: number | null
  setpointTemperature: number | null
  setpointMode: string | null
  heatingPowerRequest: number | null
  openWindow: boolean | null
  moduleIds: string[]
}

export interface ModuleSnapshot {
  id: string
  type: string
  name: string | null
  roomId: string | null
  reachable: boolean | null
  boilerStatus: boolean | null
  batteryState: string | null
}

export interface HomeSnapshot {
  homeId: string
  homeName: string | null
  fetchedAt: string
  rooms: RoomSnapshot[]
  modules: ModuleSnapshot[]
}

export const BOILER_MODULE_TYPE = 'BNS'

/**
 * Pick the configured home out of a homesdata response. Falls back to the
 * first home when the account exposes a single one under another id.
 */
export function buildTopology(homesData: HomesDataResponse, homeId: string): HomeTopology | null {
  const homes = homesData.body.homes
  const home = homes.find(h => h.id === homeId) ?? homes[0]
  if (!home) return null

  const rooms: HomeTopology['rooms'] = new Map()
  for (const room of home.rooms) {
    rooms.set(room.id, { name: room.name ?? null, moduleIds: [...room.module_ids] })
  }

  const modules: HomeTopology['modules'] = new Map()
  for (const module of home.modules) {
    modules.set(module.id, { name: module.name ?? null, type: module.type, roomId: module.room_id ?? null })
  }

  return {
    homeId: home.id,
    name: home.name ?? null,
    rooms,
    modules,
  }
}

/**
 * True when the status mentions a room the topology does not know yet.
 */
export function hasUnknownRooms(status: HomeStatusResponse, topology: HomeTopology | null): boolean {
  if (!topology) return true
  return status.body.home.rooms.some(room => !topology.rooms.has(room.id))
}

export function buildHomeSnapshot(
  status: HomeStatusResponse,
  topology: HomeTopology | null,
  fetchedAt: Date = new Date()
): HomeSnapshot {
  const home = status.body.home

  const rooms = home.rooms.map((room): RoomSnapshot => {
    const known = topology?.rooms.get(room.id)
    return {
      id: room.id,
      name: known?.name ?? null,
      reachable: room.reachable ?? null,
      measuredTemperature: room.therm_measured_temperature ?? null,
      setpointTemperature: room.therm_setpoint_temperature ?? null,
      setpointMode: room.therm_setpoint_mode ?? null,
      heatingPowerRequest: room.heating_power_request ?? null,
      openWindow: room.open_window ?? null,
      moduleIds: known ? [...known.moduleIds] : [],
    }
  })

  const modules = home.modules.map((module): ModuleSnapshot => {
    const known = topology?.modules.get(module.id)
    return {
      id: module.id,
      type: module.type,
      name: known?.name ?? null,
      roomId: known?.roomId ?? null,
      reachable: module.reachable ?? null,
      boilerStatus: module.boiler_status ?? null,
      batteryState: module.battery_state ?? null,
    }
  })

  return {
    homeId: home.id,
    homeName: topology?.name ?? null,
    fetchedAt: fetchedAt.toISOString(),
    rooms,
    modules,
  }
}
