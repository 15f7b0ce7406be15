import type { NotificationDto } from '../../../../application/domain/model/Notification'
import { EMAIL_PREFERENCE_TYPE } from '../../../../application/domain/model/NotificationPreference'
import type { NotificationHandler } from '../../../../application/handler/NotificationHandler'
import type { EmailMessage, EmailSenderPort } from '../../../../application/port/out/EmailSenderPort'
import type { NotificationService } from '../../../../application/service/NotificationService'

/**
 * reason が一致する通知を受信者にメールで送るハンドラーの基底クラス
 *
 * 次の場合は送らない:
 * - 受信者にメールアドレスがない
 * - 受信者の email 設定が無効
 */
export abstract class EmailNotificationHandler implements NotificationHandler {
    protected abstract readonly reason: string

    protected constructor(
        private readonly emailSender: EmailSenderPort,
        private readonly notificationService: NotificationService
    ) {}

    wants(notification: NotificationDto): boolean {
        return notification.reason === this.reason
    }

    async handle(notification: NotificationDto): Promise<void> {
        const { username, email } = notification.recipient

        if (!email) {
            console.log(`ℹ️  ${username} has no email address, skipping notification ${String(notification.id)}`)
            return
        }

        const preference = await this.notificationService.getNotificationPreference(
            username,
            EMAIL_PREFERENCE_TYPE
        )
        if (preference && !preference.enabled) {
            console.log(`ℹ️  ${username} disabled email notifications, skipping ${String(notification.id)}`)
            return
        }

        await this.emailSender.send(this.compose(notification, email))
    }

    protected abstract compose(notification: NotificationDto, to: string): EmailMessage
}
