import type { DependencyContainer } from 'tsyringe'
import type { EventBus } from '../../common/event/EventBus'
import { NotificationDispatchedEvent } from '../../common/event/events/NotificationDispatchedEvent'
import { NotificationDispatcher } from '../application/handler/NotificationDispatcher'
import type { NotificationProducer } from '../application/producer/NotificationProducer'
import { NotificationProducerToken } from '../application/producer/NotificationProducer'

/**
 * 通知コンテキストの初期化
 *
 * 【責務】
 * - 各プロデューサーを、それが扱うイベントタイプに購読させる
 * - 配信された通知（NotificationDispatched）をディスパッチャーに渡す
 */
export function setupNotificationContext(
    eventBus: EventBus,
    container: DependencyContainer
): void {
    console.log('🔔 Setting up notification context...')

    // ドメインイベント → 通知作成
    const producers = container.resolveAll<NotificationProducer>(NotificationProducerToken)
    for (const producer of producers) {
        for (const eventType of producer.eventTypes) {
            eventBus.subscribe(eventType, (event) => producer.processEvent(event))
        }
    }

    // 通知配信 → ハンドラー（メールなど）
    const dispatcher = container.resolve(NotificationDispatcher)
    eventBus.subscribe<NotificationDispatchedEvent>(
        NotificationDispatchedEvent.TYPE,
        async (event) => {
            await dispatcher.dispatch(event.notification)
        }
    )

    console.log(`✅ Notification context setup complete (${String(producers.length)} producers)`)
}
