/**
 * API Response types - shapes returned by the REST layer
 */

import type { RoomWatch } from '../modules/heating-monitor/watchdog'
import type { PublisherStatus } from '../modules/mqtt/publisher'
import type { HomeSnapshot } from '../modules/netatmo/snapshot'
import type { PollerStatus } from '../modules/poller/pollerService'

export interface StatusResponse {
  uptimeSeconds: number
  homeId: string
  poller: PollerStatus
  broker: PublisherStatus
  watchdog: {
    enabled: boolean
    rooms: RoomWatch[]
  }
  snapshot: HomeSnapshot | null
}
