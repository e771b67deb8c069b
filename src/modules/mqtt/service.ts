/**
 * MQTT Service - Pure functions turning a home snapshot into broker messages
 *
 * No dependencies on Fastify or on the broker client.
 */

import type { HomeSnapshot } from '../netatmo/snapshot'

// ============================================================================
// Types
// ============================================================================

export interface PublishedMessage {
  topic: string
  payload: string
}

export type MessageMode = 'state'

// ============================================================================
// Pure Functions
// ============================================================================

/**
 * Build a topic under the configured base topic.
 *
 * @example
 * buildTopic('netatmo')                    // => 'netatmo/state'
 * buildTopic('netatmo', '2255031728')      // => 'netatmo/2255031728/state'
 * buildTopic('home/netatmo/', 'boiler-1')  // => 'home/netatmo/boiler-1/state'
 */
export function buildTopic(baseTopic: string, item?: string, mode: MessageMode = 'state'): string {
  const base = baseTopic.replace(/\/+$/, '')
  if (item === undefined) {
    return `${base}/${mode}`
  }
  return `${base}/${sanitizeTopicSegment(item)}/${mode}`
}

/**
 * MQTT wildcards and separators are not allowed inside one topic level.
 */
export function sanitizeTopicSegment(segment: string): string {
  return segment.replace(/[+#/]/g, '_')
}

export function serializePayload(payload: unknown): string {
  return typeof payload === 'string' ? payload : JSON.stringify(payload)
}

/**
 * One message for the whole home, then one per room and one per module.
 */
export function buildSnapshotMessages(baseTopic: string, snapshot: HomeSnapshot): PublishedMessage[] {
  const messages: PublishedMessage[] = [
    { topic: buildTopic(baseTopic), payload: serializePayload(snapshot) },
  ]

  for (const room of snapshot.rooms) {
    messages.push({
      topic: buildTopic(baseTopic, room.id),
      payload: serializePayload({ ...room, homeId: snapshot.homeId, fetchedAt: snapshot.fetchedAt }),
    })
  }

  for (const module of snapshot.modules) {
    messages.push({
      topic: buildTopic(baseTopic, module.id),
      payload: serializePayload({ ...module, homeId: snapshot.homeId, fetchedAt: snapshot.fetchedAt }),
    })
  }

  return messages
}
