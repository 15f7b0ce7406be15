import type { Paging } from '../../../../common/search/Paging'
import type { SearchResults } from '../../../../common/search/SearchResults'
import type { NewNotification, Notification, NotificationStatus } from '../../domain/model/Notification'
import type { NotificationPreference } from '../../domain/model/NotificationPreference'

/**
 * 通知の永続化ポート
 */
export interface NotificationRepositoryPort {
    /**
     * 通知を保存し、ID と作成日時を付けて返す
     */
    create(notification: NewNotification): Promise<Notification>

    countUnreadByRecipient(recipientId: string): Promise<number>

    /**
     * 未読の通知（新しい順）
     */
    findUnreadByRecipient(recipientId: string, paging: Paging): Promise<SearchResults<Notification>>

    /**
     * 受信者が一致する通知だけを指定した状態にする
     *
     * @returns 更新した件数
     */
    markReadByIds(recipientId: string, notificationIds: readonly number[], status: NotificationStatus): Promise<number>

    findPreference(userId: string, type: string): Promise<NotificationPreference | null>
}

/**
 * DI用のシンボル
 */
export const NotificationRepositoryPortToken = Symbol('NotificationRepositoryPort')
