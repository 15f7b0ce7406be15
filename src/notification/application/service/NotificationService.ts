import { inject, injectable } from 'tsyringe'
import type { EventBus } from '../../../common/event/EventBus'
import { NotificationDispatchedEvent } from '../../../common/event/events/NotificationDispatchedEvent'
import type { Paging } from '../../../common/search/Paging'
import { normalizePaging } from '../../../common/search/Paging'
import type { SearchResults } from '../../../common/search/SearchResults'
import { toJsonTree } from '../../../common/util/json'
import { tryAction } from '../../../common/util/tryAction'
import { EventBusToken } from '../../../config/types'
import type { UserDto } from '../../../security/application/domain/model/User'
import type { UserDirectoryPort } from '../../../security/application/port/out/UserDirectoryPort'
import { UserDirectoryPortToken } from '../../../security/application/port/out/UserDirectoryPort'
import { InvalidNotificationStatusException } from '../domain/exception/InvalidNotificationStatusException'
import type {
    CreateNotificationDto,
    NewNotification,
    Notification,
    NotificationStatus,
    RecipientDto,
} from '../domain/model/Notification'
import { toNotificationDto } from '../domain/model/Notification'
import type { NotificationPreference } from '../domain/model/NotificationPreference'
import type { SendNotificationUseCase } from '../port/in/SendNotificationUseCase'
import type { NotificationRepositoryPort } from '../port/out/NotificationRepositoryPort'
import { NotificationRepositoryPortToken } from '../port/out/NotificationRepositoryPort'

/**
 * 通知サービス
 *
 * 【役割】
 * - 受信者（個人・ロール）をユーザーに解決する
 * - 受信者ごとに通知を保存する
 * - 保存した通知を NotificationDispatchedEvent として EventBus に流す
 *
 * 配信後の処理（メールなど）は reason を見たハンドラーが行う。
 */
@injectable()
export class NotificationService implements SendNotificationUseCase {
    constructor(
        @inject(NotificationRepositoryPortToken)
        private readonly notificationRepository: NotificationRepositoryPort,
        @inject(UserDirectoryPortToken)
        private readonly userDirectory: UserDirectoryPort,
        @inject(EventBusToken)
        private readonly eventBus: EventBus
    ) {}

    unreadNotifications(userId: string): Promise<number> {
        return tryAction(() => this.notificationRepository.countUnreadByRecipient(userId))
    }

    /**
     * 受信者の未読通知を新しい順に取得
     *
     * @param recipientId 受信者のユーザー名
     * @param paging 省略時は 1 ページ目・20 件
     */
    getLatestNotifications(
        recipientId: string,
        paging?: Partial<Paging> | null
    ): Promise<SearchResults<Notification>> {
        return tryAction(() =>
            this.notificationRepository.findUnreadByRecipient(recipientId, normalizePaging(paging))
        )
    }

    /**
     * 新しい通知を送る
     *
     * 【処理の流れ】
     * 1. 宛先を受信者（ユーザー）に解決
     * 2. 受信者ごとに通知を保存
     * 3. 保存した通知を EventBus に発行
     */
    async sendNotification(newNotification: CreateNotificationDto): Promise<void> {
        console.debug(`📨 Creating new notification(s): ${newNotification.reason}`)

        const resolvedRecipients = await this.calculateRecipients(newNotification.recipient)

        if (resolvedRecipients.length === 0) {
            console.warn(`⚠️  No recipients resolved for notification: ${newNotification.reason}`)
            return
        }

        const payload = toJsonTree(newNotification.payload)

        for (const resolvedRecipient of resolvedRecipients) {
            const notification: NewNotification = {
                category: newNotification.category,
                reason: newNotification.reason,
                reasonMessage: newNotification.reasonMessage,
                status: 'OPEN',
                recipient: resolvedRecipient.username,
                source: newNotification.source,
                payload,
            }

            await tryAction(async () => {
                const saved = await this.notificationRepository.create(notification)
                console.debug(`💾 Notification ${String(saved.id)} saved for ${saved.recipient}`)

                const dto = toNotificationDto(saved, resolvedRecipient)
                await this.eventBus.publish(new NotificationDispatchedEvent(dto))
            })
        }
    }

    /**
     * 通知を既読にする
     *
     * 受信者が一致しない通知は何もされない（エラーにもならない）。
     * 他人の通知を操作させないため、recipientId はリクエストの認証情報から渡すこと。
     *
     * @throws InvalidNotificationStatusException status に OPEN を指定した場合
     */
    async markNotificationsAsRead(
        recipientId: string,
        notificationIds: readonly number[],
        status: NotificationStatus
    ): Promise<void> {
        if (notificationIds.length === 0) {
            return
        }

        if (status === 'OPEN') {
            throw new InvalidNotificationStatusException(status)
        }

        const updated = await tryAction(() =>
            this.notificationRepository.markReadByIds(recipientId, notificationIds, status)
        )
        console.debug(
            `📝 Marked ${String(updated)}/${String(notificationIds.length)} notifications of ${recipientId} as ${status}`
        )
    }

    getNotificationPreference(userId: string, type: string): Promise<NotificationPreference | null> {
        return tryAction(() => this.notificationRepository.findPreference(userId, type))
    }

    /**
     * 宛先リストをユーザーに解決する
     *
     * 宛先ごとの解決結果を順に連結する。複数の宛先に該当するユーザーには宛先の数だけ届く。
     */
    private async calculateRecipients(recipients: readonly RecipientDto[]): Promise<UserDto[]> {
        const resolved: UserDto[] = []

        for (const recipient of recipients) {
            resolved.push(...(await this.calculateRecipient(recipient)))
        }

        return resolved
    }

    private async calculateRecipient(singleRecipient: RecipientDto): Promise<UserDto[]> {
        switch (singleRecipient.recipientType) {
            case 'INDIVIDUAL': {
                const user = await tryAction(() => this.userDirectory.findUser(singleRecipient.recipient))
                return user ? [user] : []
            }
            case 'ROLE':
                return tryAction(() => this.userDirectory.findUsersWithRole(singleRecipient.recipient))
            default: {
                const unexpected: never = singleRecipient.recipientType
                throw new Error(`Unexpected recipient type: ${String(unexpected)}`)
            }
        }
    }
}
