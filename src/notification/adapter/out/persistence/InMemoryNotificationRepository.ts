import { injectable } from 'tsyringe'
import type { Paging } from '../../../../common/search/Paging'
import { paginate } from '../../../../common/search/Paging'
import type { SearchResults } from '../../../../common/search/SearchResults'
import type { NewNotification, Notification, NotificationStatus } from '../../../application/domain/model/Notification'
import type { NotificationPreference } from '../../../application/domain/model/NotificationPreference'
import type { NotificationRepositoryPort } from '../../../application/port/out/NotificationRepositoryPort'

/**
 * インメモリの通知リポジトリ
 * 開発・テスト用の簡易実装
 */
@injectable()
export class InMemoryNotificationRepository implements NotificationRepositoryPort {
    private notifications: Notification[] = []
    private preferences = new Map<string, NotificationPreference>()
    private nextId = 1

    create(notification: NewNotification): Promise<Notification> {
        const now = new Date()
        const saved: Notification = {
            ...notification,
            id: this.nextId++,
            createdOn: now,
            modifiedOn: now,
        }
        this.notifications.push(saved)
        return Promise.resolve({ ...saved })
    }

    countUnreadByRecipient(recipientId: string): Promise<number> {
        return Promise.resolve(this.unreadOf(recipientId).length)
    }

    findUnreadByRecipient(recipientId: string, paging: Paging): Promise<SearchResults<Notification>> {
        // 新しい順（同時刻なら ID の大きい順）
        const unread = this.unreadOf(recipientId).sort(
            (a, b) => b.createdOn.getTime() - a.createdOn.getTime() || b.id - a.id
        )

        return Promise.resolve({
            beans: paginate(unread, paging).map((notification) => ({ ...notification })),
            totalSize: unread.length,
        })
    }

    markReadByIds(
        recipientId: string,
        notificationIds: readonly number[],
        status: NotificationStatus
    ): Promise<number> {
        let updated = 0
        const now = new Date()

        for (const notification of this.notifications) {
            if (notification.recipient === recipientId && notificationIds.includes(notification.id)) {
                notification.status = status
                notification.modifiedOn = now
                updated++
            }
        }

        return Promise.resolve(updated)
    }

    findPreference(userId: string, type: string): Promise<NotificationPreference | null> {
        const preference = this.preferences.get(this.preferenceKey(userId, type))
        return Promise.resolve(preference ? { ...preference } : null)
    }

    /**
     * 通知設定を保存（開発・テスト用）
     */
    savePreference(preference: NotificationPreference): void {
        this.preferences.set(this.preferenceKey(preference.userId, preference.type), { ...preference })
    }

    clear(): void {
        this.notifications = []
        this.preferences.clear()
        this.nextId = 1
    }

    private unreadOf(recipientId: string): Notification[] {
        return this.notifications.filter(
            (notification) => notification.recipient === recipientId && notification.status === 'OPEN'
        )
    }

    private preferenceKey(userId: string, type: string): string {
        return `${userId}:${type}`
    }
}
