import type { CreateNotificationDto } from '../../domain/model/Notification'

/**
 * 通知送信ユースケース（入力ポート）
 *
 * プロデューサーはこのインターフェースだけに依存する。
 */
export interface SendNotificationUseCase {
    /**
     * 受信者を解決し、1人ずつ通知を保存して配信する
     */
    sendNotification(newNotification: CreateNotificationDto): Promise<void>
}

export const SendNotificationUseCaseToken = Symbol('SendNotificationUseCase')
