/**
 * Unit tests for MQTT Service
 */
import { describe, it, expect } from 'vitest'
import { buildSnapshotMessages, buildTopic, sanitizeTopicSegment, serializePayload } from '../service'
import type { HomeSnapshot } from '../../netatmo/snapshot'

const snapshot: HomeSnapshot = {
    homeId: 'home-1',
    homeName: 'Maison',
    fetchedAt: '2026-01-05T10:00:00.000Z',
    rooms: [
        {
            id: 'room-1',
            name: 'Salon',
            reachable: true,
            measuredTemperature: 19.5,
            setpointTemperature: 21,
            setpointMode: 'schedule',
            heatingPowerRequest: 0,
            openWindow: false,
            moduleIds: [],
        },
    ],
    modules: [
        {
            id: 'boiler-1',
            type: 'BNS',
            name: null,
            roomId: null,
            reachable: true,
            boilerStatus: false,
            batteryState: null,
        },
    ],
}

// ============================================================================
// buildTopic Tests
// ============================================================================

describe('buildTopic', () => {
    it('should build the home-level state topic', () => {
        expect(buildTopic('netatmo')).toBe('netatmo/state')
    })

    it('should build an item state topic', () => {
        expect(buildTopic('netatmo', '2255031728')).toBe('netatmo/2255031728/state')
    })

    it('should ignore trailing slashes on the base topic', () => {
        expect(buildTopic('home/netatmo//', 'boiler-1')).toBe('home/netatmo/boiler-1/state')
    })

    it('should sanitize the item segment', () => {
        expect(buildTopic('netatmo', '70:ee/50#+')).toBe('netatmo/70:ee_50__/state')
    })
})

describe('sanitizeTopicSegment', () => {
    it('should leave ordinary ids untouched', () => {
        expect(sanitizeTopicSegment('04:00:00:aa:bb:cc')).toBe('04:00:00:aa:bb:cc')
    })
})

describe('serializePayload', () => {
    it('should pass strings through and encode everything else as JSON', () => {
        expect(serializePayload('on')).toBe('on')
        expect(serializePayload({ a: 1 })).toBe('{"a":1}')
        expect(serializePayload(21.5)).toBe('21.5')
    })
})

// ============================================================================
// buildSnapshotMessages Tests
// ============================================================================

describe('buildSnapshotMessages', () => {
    it('should emit the home, then each room, then each module', () => {
        const messages = buildSnapshotMessages('netatmo', snapshot)

        expect(messages.map(message => message.topic)).toEqual([
            'netatmo/state',
            'netatmo/room-1/state',
            'netatmo/boiler-1/state',
        ])
    })

    it('should publish the full snapshot on the home topic', () => {
        const [home] = buildSnapshotMessages('netatmo', snapshot)

        expect(JSON.parse(home.payload)).toEqual(snapshot)
    })

    it('should tag item payloads with the home and fetch time', () => {
        const [, room, module] = buildSnapshotMessages('netatmo', snapshot)

        expect(JSON.parse(room.payload)).toEqual({
            ...snapshot.rooms[0],
            homeId: 'home-1',
            fetchedAt: '2026-01-05T10:00:00.000Z',
        })
        expect(JSON.parse(module.payload)).toMatchObject({ id: 'boiler-1', boilerStatus: false, homeId: 'home-1' })
    })

    it('should produce identical messages for an identical snapshot', () => {
        expect(buildSnapshotMessages('netatmo', snapshot)).toEqual(buildSnapshotMessages('netatmo', snapshot))
    })
})
