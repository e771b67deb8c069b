import type { AppLogger } from '../../lib/logger'
import type { HeatingWatchdog } from '../heating-monitor/watchdog'
import type { SnapshotPublisher } from '../mqtt/publisher'
import type { ThermostatApi } from '../netatmo/client'
import {
  buildHomeSnapshot,
  buildTopology,
  hasUnknownRooms,
  type HomeSnapshot,
  type HomeTopology,
} from '../netatmo/snapshot'

export type PollState = 'idle' | 'in-flight'

export interface PollerStatus {
  running: boolean
  state: PollState
  intervalSeconds: number
  cycles: number
  failures: number
  skipped: number
  lastSuccessAt: string | null
  lastErrorAt: string | null
  lastError: string | null
}

export interface CycleResult {
  ok: boolean
  messages: number
  error?: string
}

/**
 * Fixed-interval poll-and-publish loop.
 * A failing cycle is logged and forgotten; the next tick runs as usual.
 */
export class PollerService {
  private intervalId: NodeJS.Timeout | null = null
  private state: PollState = 'idle'
  private topology: HomeTopology | null = null
  private lastSnapshot: HomeSnapshot | null = null
  private cycles = 0
  private failures = 0
  private skipped = 0
  private lastSuccessAt: Date | null = null
  private lastErrorAt: Date | null = null
  private lastError: string | null = null

  constructor(
    private readonly api: ThermostatApi,
    private readonly publisher: SnapshotPublisher,
    private readonly logger: AppLogger,
    private readonly options: { homeId: string; intervalSeconds: number },
    private readonly watchdog?: HeatingWatchdog
  ) {}

  get isRunning(): boolean {
    return this.intervalId !== null
  }

  /**
   * Run one cycle right away, then one every `intervalSeconds`.
   */
  start(): void {
    if (this.intervalId) {
      this.logger.warn('[POLLER] Poller already running')
      return
    }

    this.logger.info(`[POLLER] Polling home ${this.options.homeId} every ${this.options.intervalSeconds}s`)

    this.intervalId = setInterval(() => {
      void this.runOnce()
    }, this.options.intervalSeconds * 1000)

    void this.runOnce()
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId)
      this.intervalId = null
      this.logger.info('[POLLER] Poller stopped')
    }
  }

  getLastSnapshot(): HomeSnapshot | null {
    return this.lastSnapshot
  }

  getStatus(): PollerStatus {
    return {
      running: this.isRunning,
      state: this.state,
      intervalSeconds: this.options.intervalSeconds,
      cycles: this.cycles,
      failures: this.failures,
      skipped: this.skipped,
      lastSuccessAt: this.lastSuccessAt?.toISOString() ?? null,
      lastErrorAt: this.lastErrorAt?.toISOString() ?? null,
      lastError: this.lastError,
    }
  }

  /**
   * One poll cycle: fetch, watchdog, publish. Never rejects.
   */
  async runOnce(): Promise<CycleResult> {
    if (this.state === 'in-flight') {
      this.skipped++
      this.logger.debug('[POLLER] Previous cycle still in flight, skipping tick')
      return { ok: false, messages: 0, error: 'cycle already in flight' }
    }

    this.state = 'in-flight'
    this.cycles++

    try {
      const status = await this.api.getHomeStatus(this.options.homeId)

      if (hasUnknownRooms(status, this.topology)) {
        await this.refreshTopology()
      }

      const snapshot = buildHomeSnapshot(status, this.topology)
      this.lastSnapshot = snapshot

      if (this.watchdog?.enabled) {
        await this.watchdog.evaluate(snapshot, status.body.home.modules)
      }

      const messages = await this.publisher.publishSnapshot(snapshot)

      this.lastSuccessAt = new Date()
      this.logger.debug({
        msg: `[POLLER] Cycle ${this.cycles} published ${messages} messages`,
        rooms: snapshot.rooms.length,
        modules: snapshot.modules.length,
      })
      return { ok: true, messages }
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : 'Unknown error'
      this.failures++
      this.lastErrorAt = new Date()
      this.lastError = errorMessage
      this.logger.error({
        msg: `[POLLER] Cycle ${this.cycles} failed, retrying on next tick: ${errorMessage}`,
        error: err instanceof Error ? err.name : undefined,
      })
      return { ok: false, messages: 0, error: errorMessage }
    } finally {
      this.state = 'idle'
    }
  }

  /**
   * Names and room membership. A failure keeps the previous topology and
   * lets the cycle go on with what it has.
   */
  private async refreshTopology(): Promise<void> {
    try {
      const homesData = await this.api.getHomesData(this.options.homeId)
      const topology = buildTopology(homesData, this.options.homeId)
      if (topology) {
        this.topology = topology
        this.logger.info({
          msg: `[POLLER] Home topology loaded: ${topology.rooms.size} rooms, ${topology.modules.size} modules`,
          homeId: topology.homeId,
        })
      }
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : 'Unknown error'
      this.logger.warn({ msg: `[POLLER] Could not load home topology: ${errorMessage}` })
    }
  }
}
