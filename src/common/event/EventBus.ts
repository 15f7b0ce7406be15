import { injectable } from 'tsyringe'
import type { DomainEvent } from './DomainEvent'

/**
 * イベントハンドラーの型定義
 *
 * @template T - 処理するイベントの型（DomainEvent のサブタイプ）
 *
 * @example
 * ```typescript
 * const handler: EventHandler<AccountSignupEvent> = async (event) => {
 *   await producer.processEvent(event)
 * }
 * ```
 */
export type EventHandler<T extends DomainEvent> = (event: T) => Promise<void>

/**
 * イベントバス（プロセス内 Pub/Sub）
 *
 * 【役割】
 * - イベントの発行（publish）
 * - イベントの購読（subscribe）
 * - イベントタイプ（文字列）とハンドラーの紐付け管理
 *
 * 【使用例】
 * ```typescript
 * const eventBus = container.resolve<EventBus>(EventBusToken)
 *
 * eventBus.subscribe<NotificationDispatchedEvent>(
 *     NotificationDispatchedEvent.TYPE,
 *     (event) => dispatcher.dispatch(event.notification)
 * )
 *
 * await eventBus.publish(new NotificationDispatchedEvent(dto))
 * ```
 */
@injectable()
export class EventBus {
    /**
     * キー: イベントタイプ（例: 'AccountSignup'）
     * 値: ハンドラーの配列（複数の購読者をサポート）
     */
    private eventTypeToHandlers = new Map<string, EventHandler<DomainEvent>[]>()

    /**
     * イベントを購読する
     *
     * @param eventType イベントの種類（例: 'ApiSignup'）
     * @param handler イベント発生時に実行する関数
     */
    subscribe<T extends DomainEvent>(
        eventType: string,
        handler: EventHandler<T>
    ): void {
        const handlers = this.eventTypeToHandlers.get(eventType) ?? []

        handlers.push(handler as EventHandler<DomainEvent>)
        this.eventTypeToHandlers.set(eventType, handlers)

        console.log(`📝 Subscribed to event: ${eventType}`)
    }

    /**
     * イベントを発行する
     *
     * 【動作フロー】
     * 1. イベントタイプに対応するハンドラーを全て取得
     * 2. 全てのハンドラーを並列実行
     * 3. 失敗したハンドラーはログに記録する（publish 自体は失敗させない）
     */
    async publish(event: DomainEvent): Promise<void> {
        console.log(`📤 Publishing event: ${event.eventType} (ID: ${event.eventId})`)

        const handlers = this.eventTypeToHandlers.get(event.eventType) ?? []

        if (handlers.length === 0) {
            console.log(`⚠️  No handlers for event: ${event.eventType}`)
            return
        }

        const results = await Promise.allSettled(
            handlers.map((handler) => handler(event))
        )

        results.forEach((result, index) => {
            if (result.status === 'rejected') {
                console.error(
                    `❌ Handler ${String(index)} failed for event ${event.eventType}:`,
                    result.reason
                )
            }
        })
    }

    /**
     * 指定したイベントタイプの購読者数
     */
    handlerCount(eventType: string): number {
        return this.eventTypeToHandlers.get(eventType)?.length ?? 0
    }

    /**
     * 全てのハンドラーをクリア（主にテスト用）
     */
    clear(): void {
        this.eventTypeToHandlers.clear()
        console.log('🗑️  EventBus cleared')
    }
}
