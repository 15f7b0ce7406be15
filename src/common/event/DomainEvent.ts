/**
 * ドメインイベントの基底インターフェース
 *
 * 【ドメインイベントとは？】
 * ドメインで発生した重要な出来事を表すオブジェクト。
 *
 * 例：
 * - AccountSignupEvent: SSO で新しいアカウントが作成された
 * - ApiSignupEvent: 開発者が API プランへの利用申請をした
 * - NotificationDispatchedEvent: 通知が保存され、ハンドラーへ配信される
 *
 * 【なぜイベントを使うのか？】
 * コンテキスト間を疎結合に保つため。
 * ```
 * SsoEventService → イベント発行 → EventBus → NewAccountNotificationProducer
 *                                   ↑ 発行者は購読者を知らない
 * ```
 */
export interface DomainEvent {
    /**
     * イベントの一意な識別子
     */
    readonly eventId: string

    /**
     * イベントが発生した日時
     */
    readonly occurredOn: Date

    /**
     * イベントの種類を示す文字列
     * EventBus はこの値でハンドラーを選ぶ
     *
     * 例: 'AccountSignup', 'NotificationDispatched'
     */
    readonly eventType: string
}
