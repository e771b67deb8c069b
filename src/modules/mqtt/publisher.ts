import mqtt, { type IClientOptions, type MqttClient } from 'mqtt'
import type { AppConfig } from '../../config/env'
import type { AppLogger } from '../../lib/logger'
import type { HomeSnapshot } from '../netatmo/snapshot'
import { buildSnapshotMessages, type PublishedMessage } from './service'

export type MqttConnect = (brokerUrl: string, options: IClientOptions) => MqttClient

export class BrokerUnavailableError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'BrokerUnavailableError'
  }
}

/**
 * The publishing side the poller depends on.
 */
export interface SnapshotPublisher {
  readonly connected: boolean
  publishSnapshot(snapshot: HomeSnapshot): Promise<number>
}

export interface PublisherStatus {
  connected: boolean
  brokerUrl: string
  topic: string
  published: number
  lastPublishedAt: string | null
}

/**
 * Owns the single broker connection. Reconnection is left to mqtt.js
 * (`reconnectPeriod`); this class only logs what happens to the link.
 */
export class MqttPublisher implements SnapshotPublisher {
  private client: MqttClient | null = null
  private published = 0
  private lastPublishedAt: Date | null = null
  readonly brokerUrl: string

  constructor(
    private readonly options: AppConfig['mqtt'],
    private readonly logger: AppLogger,
    private readonly connectFn: MqttConnect = mqtt.connect
  ) {
    const protocol = options.tls ? 'mqtts' : 'mqtt'
    this.brokerUrl = `${protocol}://${options.broker}:${options.port}`
  }

  get connected(): boolean {
    return this.client?.connected ?? false
  }

  get status(): PublisherStatus {
    return {
      connected: this.connected,
      brokerUrl: this.brokerUrl,
      topic: this.options.topic,
      published: this.published,
      lastPublishedAt: this.lastPublishedAt?.toISOString() ?? null,
    }
  }

  connect(): void {
    if (this.client) return

    const client = this.connectFn(this.brokerUrl, {
      clientId: `netatmo_bridge_${Date.now()}`,
      username: this.options.username,
      password: this.options.password,
      keepalive: this.options.keepalive,
      reconnectPeriod: 5000,
      connectTimeout: 10000,
    })

    client.on('connect', () => {
      this.logger.success({
        msg: '✓ [MQTT] Connected to broker',
        broker: this.brokerUrl,
        topic: this.options.topic,
      })
    })

    client.on('reconnect', () => {
      this.logger.info({ msg: '[MQTT] Reconnecting to broker...', broker: this.brokerUrl })
    })

    client.on('offline', () => {
      this.logger.warn({ msg: '[MQTT] Broker connection lost', broker: this.brokerUrl })
    })

    client.on('error', err => {
      this.logger.error({
        msg: '[MQTT] Connection error',
        error: err.message,
        broker: this.brokerUrl,
      })
    })

    this.client = client
  }

  /**
   * Publish every message of the snapshot. Nothing is deduplicated: the
   * same snapshot published twice goes out twice.
   */
  async publishSnapshot(snapshot: HomeSnapshot): Promise<number> {
    const messages = buildSnapshotMessages(this.options.topic, snapshot)
    for (const message of messages) {
      await this.publish(message)
    }

    this.logger.debug({
      msg: `[MQTT] Published ${messages.length} messages for home ${snapshot.homeId}`,
      direction: 'OUT',
    })
    return messages.length
  }

  async publish(message: PublishedMessage): Promise<void> {
    const client = this.client
    if (!client || !client.connected) {
      throw new BrokerUnavailableError(`Not connected to broker ${this.brokerUrl}`)
    }

    await client.publishAsync(message.topic, message.payload, { qos: 0 })
    this.published++
    this.lastPublishedAt = new Date()
  }

  async close(): Promise<void> {
    const client = this.client
    if (!client) return
    this.client = null
    await client.endAsync()
    this.logger.info({ msg: '[MQTT] Broker connection closed', broker: this.brokerUrl })
  }
}
