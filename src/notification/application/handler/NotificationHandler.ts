import type { NotificationDto } from '../domain/model/Notification'

/**
 * 配信された通知を処理するハンドラー（メール送信など）
 */
export interface NotificationHandler {
    /**
     * この通知を処理するかどうか（通常は reason で判定）
     */
    wants(notification: NotificationDto): boolean

    handle(notification: NotificationDto): Promise<void>
}

/**
 * DI用のシンボル（injectAll で全ハンドラーを取得する）
 */
export const NotificationHandlerToken = Symbol('NotificationHandler')
