import 'reflect-metadata'

import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { DomainEvent } from '../../../src/common/event/DomainEvent'
import { EventBus } from '../../../src/common/event/EventBus'

function testEvent(eventType = 'TestEvent'): DomainEvent {
    return { eventId: 'evt-1', occurredOn: new Date('2024-05-01T00:00:00Z'), eventType }
}

describe('EventBus', () => {
    let eventBus: EventBus

    beforeEach(() => {
        eventBus = new EventBus()
    })

    it('購読したイベントタイプのハンドラーにイベントが渡されること', async () => {
        const handler = vi.fn().mockResolvedValue(undefined)
        eventBus.subscribe('TestEvent', handler)

        const event = testEvent()
        await eventBus.publish(event)

        expect(handler).toHaveBeenCalledTimes(1)
        expect(handler).toHaveBeenCalledWith(event)
    })

    it('別のイベントタイプのハンドラーは呼ばれないこと', async () => {
        const handler = vi.fn().mockResolvedValue(undefined)
        eventBus.subscribe('OtherEvent', handler)

        await eventBus.publish(testEvent())

        expect(handler).not.toHaveBeenCalled()
    })

    it('ハンドラーが失敗しても publish は成功し、他のハンドラーも実行されること', async () => {
        const failing = vi.fn().mockRejectedValue(new Error('handler failed'))
        const succeeding = vi.fn().mockResolvedValue(undefined)
        eventBus.subscribe('TestEvent', failing)
        eventBus.subscribe('TestEvent', succeeding)

        await expect(eventBus.publish(testEvent())).resolves.toBeUndefined()

        expect(failing).toHaveBeenCalledTimes(1)
        expect(succeeding).toHaveBeenCalledTimes(1)
    })

    it('購読者がいなくても publish が成功すること', async () => {
        await expect(eventBus.publish(testEvent('Nobody'))).resolves.toBeUndefined()
    })

    it('handlerCount と clear が購読状態を反映すること', () => {
        eventBus.subscribe('TestEvent', vi.fn().mockResolvedValue(undefined))
        eventBus.subscribe('TestEvent', vi.fn().mockResolvedValue(undefined))

        expect(eventBus.handlerCount('TestEvent')).toBe(2)
        expect(eventBus.handlerCount('OtherEvent')).toBe(0)

        eventBus.clear()

        expect(eventBus.handlerCount('TestEvent')).toBe(0)
    })
})
