import { randomUUID } from 'node:crypto'
import type { NotificationDto } from '../../../notification/application/domain/model/Notification'
import type { DomainEvent } from '../DomainEvent'

/**
 * 通知配信イベント
 *
 * 【いつ発行されるか】
 * NotificationService が通知を保存した直後（受信者1人につき1回）
 *
 * 【誰が購読するか】
 * - NotificationDispatcher: reason に応じたハンドラー（メール送信など）を実行する
 */
export class NotificationDispatchedEvent implements DomainEvent {
    static readonly TYPE = 'NotificationDispatched'

    readonly eventId: string
    readonly occurredOn: Date
    readonly eventType = NotificationDispatchedEvent.TYPE

    constructor(public readonly notification: NotificationDto) {
        this.eventId = randomUUID()
        this.occurredOn = new Date()
    }
}
