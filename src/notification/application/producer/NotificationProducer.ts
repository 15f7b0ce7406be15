import type { DomainEvent } from '../../../common/event/DomainEvent'

/**
 * ドメインイベントを通知作成リクエストに変換するプロデューサー
 *
 * eventTypes に挙げたイベントが EventBus から渡される。
 * 関係のないイベントは無視すること。
 */
export interface NotificationProducer {
    readonly eventTypes: readonly string[]

    processEvent(event: DomainEvent): Promise<void>
}

/**
 * DI用のシンボル（injectAll で全プロデューサーを取得する）
 */
export const NotificationProducerToken = Symbol('NotificationProducer')
