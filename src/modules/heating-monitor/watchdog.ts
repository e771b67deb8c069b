import type { AppLogger } from '../../lib/logger'
import type { ThermostatApi } from '../netatmo/client'
import type { HomeStatusResponse } from '../netatmo/schema'
import { BOILER_MODULE_TYPE, type HomeSnapshot, type RoomSnapshot } from '../netatmo/snapshot'

type ModuleStatus = HomeStatusResponse['body']['home']['modules'][number]

const OPEN_VALVE_WORDS = new Set(['open', 'opened', 'on', 'active'])

export interface WatchdogOptions {
  enabled: boolean
  homeId: string
  /** Poll cycles a room may keep requesting heat without warming up */
  checkRounds: number
  /** Minimum rise, in °C, that ends a watch successfully */
  tempDelta: number
  /** Count rooms with an open valve as requesting heat */
  valveDetection?: boolean
  /** Upper-case module types treated as radiator valves */
  valveTypes?: readonly string[]
  /** Valve module fields inspected for an open valve, in order */
  valveActiveKeys?: readonly string[]
}

export const DEFAULT_VALVE_TYPES: readonly string[] = ['NRV', 'VALVE']

export const DEFAULT_VALVE_ACTIVE_KEYS: readonly string[] = [
  'valve_position',
  'valve',
  'position',
  'open',
  'heating_power_request',
  'valve_level',
]

export interface RoomWatch {
  roomId: string
  roomName: string | null
  initialTemperature: number
  rounds: number
  startedAt: string
}

export type WatchOutcome = 'warmed' | 'timed_out' | 'boiler_off'

export interface WatchdogEvent {
  roomId: string
  outcome: WatchOutcome
  rounds: number
  initialTemperature: number
  finalTemperature: number | null
}

export interface WatchdogResult {
  boilerOn: boolean | null
  started: string[]
  ended: WatchdogEvent[]
  awaySet: boolean
}

/**
 * Heating watchdog.
 *
 * A room that requests heat is watched for `checkRounds` poll cycles. If its
 * temperature does not rise by `tempDelta` in that window the home is put in
 * `away` mode, on the assumption that the boiler is not delivering.
 */
export class HeatingWatchdog {
  private watches = new Map<string, RoomWatch>()

  constructor(
    private readonly api: ThermostatApi,
    private readonly options: WatchdogOptions,
    private readonly logger: AppLogger
  ) {}

  get enabled(): boolean {
    return this.options.enabled
  }

  getWatches(): RoomWatch[] {
    return Array.from(this.watches.values(), watch => ({ ...watch }))
  }

  /**
   * One watchdog round. `moduleStatuses` are the raw homestatus modules,
   * needed for the valve fields the snapshot does not carry.
   */
  async evaluate(snapshot: HomeSnapshot, moduleStatuses: ModuleStatus[] = []): Promise<WatchdogResult> {
    const result: WatchdogResult = { boilerOn: null, started: [], ended: [], awaySet: false }
    if (!this.options.enabled) return result

    const boilers = snapshot.modules.filter(m => m.type.toUpperCase() === BOILER_MODULE_TYPE)
    if (boilers.length > 0) {
      result.boilerOn = boilers.some(m => m.boilerStatus === true)
      if (!result.boilerOn) {
        for (const watch of this.watches.values()) {
          result.ended.push(this.endWatch(watch, 'boiler_off', null))
        }
        if (result.ended.length > 0) {
          this.logger.info({ msg: `[WATCHDOG] Boiler is off, dropped ${result.ended.length} watches` })
        }
        return result
      }
    }

    const roomsById = new Map(snapshot.rooms.map(room => [room.id, room]))
    let timedOut = false

    for (const watch of Array.from(this.watches.values())) {
      const room = roomsById.get(watch.roomId)
      watch.rounds++
      const current = room?.measuredTemperature ?? null

      if (current !== null && current - watch.initialTemperature >= this.options.tempDelta) {
        this.logger.info({
          msg: `[WATCHDOG] Room ${watch.roomId} warmed up by ${(current - watch.initialTemperature).toFixed(1)}°C`,
          rounds: watch.rounds,
        })
        result.ended.push(this.endWatch(watch, 'warmed', current))
        continue
      }

      if (watch.rounds >= this.options.checkRounds) {
        this.logger.warn({
          msg: `[WATCHDOG] Room ${watch.roomId} did not warm up after ${watch.rounds} rounds`,
          initialTemperature: watch.initialTemperature,
          currentTemperature: current,
        })
        result.ended.push(this.endWatch(watch, 'timed_out', current))
        timedOut = true
      }
    }

    if (timedOut) {
      result.awaySet = await this.switchToAway()
    }

    const statusById = new Map(moduleStatuses.map(module => [module.id, module]))
    const typeById = new Map(snapshot.modules.map(module => [module.id, module.type.toUpperCase()]))

    for (const room of snapshot.rooms) {
      if (this.watches.has(room.id) || room.measuredTemperature === null) continue
      if (!this.isRoomActive(room, statusById, typeById, result.boilerOn)) continue

      this.watches.set(room.id, {
        roomId: room.id,
        roomName: room.name,
        initialTemperature: room.measuredTemperature,
        rounds: 0,
        startedAt: snapshot.fetchedAt,
      })
      result.started.push(room.id)
      this.logger.info({
        msg: `[WATCHDOG] Watching room ${room.name ?? room.id} from ${room.measuredTemperature}°C`,
        roomId: room.id,
      })
    }

    return result
  }

  /**
   * A room is active when it requests heat. With valve detection on, it is
   * also active when one of its valves reports an open position, or when it
   * holds both a boiler and a valve module while the boiler runs.
   */
  private isRoomActive(
    room: RoomSnapshot,
    statusById: Map<string, ModuleStatus>,
    typeById: Map<string, string>,
    boilerOn: boolean | null
  ): boolean {
    if (isRequestingHeat(room)) return true
    if (this.options.valveDetection === false) return false

    const valveTypes = new Set(this.options.valveTypes ?? DEFAULT_VALVE_TYPES)
    const activeKeys = this.options.valveActiveKeys ?? DEFAULT_VALVE_ACTIVE_KEYS
    let hasBoiler = false
    let hasValve = false

    for (const moduleId of room.moduleIds) {
      const type = typeById.get(moduleId)
      if (type === BOILER_MODULE_TYPE) hasBoiler = true
      if (type === undefined || !valveTypes.has(type)) continue
      hasValve = true

      const status = statusById.get(moduleId)
      const key = status ? activeKeys.find(name => isOpenValveValue(status[name])) : undefined
      if (status && key !== undefined) {
        this.logger.info({
          msg: `[WATCHDOG] Valve ${moduleId} of room ${room.id} is open`,
          field: key,
          value: status[key],
        })
        return true
      }
    }

    if (hasBoiler && hasValve && boilerOn === true) {
      this.logger.info({ msg: `[WATCHDOG] Room ${room.id} has a boiler and a valve while the boiler is on` })
      return true
    }
    return false
  }

  private endWatch(watch: RoomWatch, outcome: WatchOutcome, finalTemperature: number | null): WatchdogEvent {
    this.watches.delete(watch.roomId)
    return {
      roomId: watch.roomId,
      outcome,
      rounds: watch.rounds,
      initialTemperature: watch.initialTemperature,
      finalTemperature,
    }
  }

  private async switchToAway(): Promise<boolean> {
    try {
      await this.api.setThermostatMode(this.options.homeId, 'away')
      this.logger.warn({ msg: '[WATCHDOG] Home switched to away mode', homeId: this.options.homeId })
      return true
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : 'Unknown error'
      this.logger.error({ msg: `[WATCHDOG] Failed to switch home to away: ${errorMessage}` })
      return false
    }
  }
}

export function isRequestingHeat(room: RoomSnapshot): boolean {
  return room.heatingPowerRequest !== null && room.heatingPowerRequest > 0
}

/**
 * Positive numbers (or numeric strings), `true`, and words such as "open".
 */
export function isOpenValveValue(value: unknown): boolean {
  if (typeof value === 'boolean') return value
  if (typeof value === 'number') return value > 0
  if (typeof value !== 'string' || value.trim() === '') return false

  const numeric = Number(value)
  if (!Number.isNaN(numeric)) return numeric > 0
  return OPEN_VALVE_WORDS.has(value.trim().toLowerCase())
}
