import { inject, injectable } from 'tsyringe'
import type { Paging } from '../../../../common/search/Paging'
import { toRange } from '../../../../common/search/Paging'
import type { SearchResults } from '../../../../common/search/SearchResults'
import type { TypedSupabaseClient } from '../../../../config/types'
import { SupabaseClientToken } from '../../../../config/types'
import type { NewNotification, Notification, NotificationStatus } from '../../../application/domain/model/Notification'
import type { NotificationPreference } from '../../../application/domain/model/NotificationPreference'
import type { NotificationRepositoryPort } from '../../../application/port/out/NotificationRepositoryPort'
import { NotificationPreferenceRecordSchema, NotificationRecordSchema } from './entities/NotificationRecord'
import { preferenceToDomain, toDomain, toInsertRecord } from './mappers/NotificationMapper'

/**
 * Supabase の notifications / notification_preferences テーブルを使った通知リポジトリ
 *
 * 取得した行は zod で検証してからドメインモデルに変換する。
 */
@injectable()
export class SupabaseNotificationRepository implements NotificationRepositoryPort {
    constructor(
        @inject(SupabaseClientToken) private readonly supabase: TypedSupabaseClient
    ) {}

    async create(notification: NewNotification): Promise<Notification> {
        const { data, error } = await this.supabase
            .from('notifications')
            .insert(toInsertRecord(notification))
            .select('*')

        if (error) {
            throw new Error(`Failed to insert notification: ${error.message}`)
        }

        const [saved] = NotificationRecordSchema.array().parse(data)
        if (!saved) {
            throw new Error('Failed to insert notification: no row returned')
        }

        return toDomain(saved)
    }

    async countUnreadByRecipient(recipientId: string): Promise<number> {
        const { count, error } = await this.supabase
            .from('notifications')
            .select('*', { count: 'exact', head: true })
            .eq('recipient', recipientId)
            .eq('status', 'OPEN')

        if (error) {
            throw new Error(`Failed to count notifications: ${error.message}`)
        }

        return count ?? 0
    }

    async findUnreadByRecipient(recipientId: string, paging: Paging): Promise<SearchResults<Notification>> {
        const { from, to } = toRange(paging)

        const { data, count, error } = await this.supabase
            .from('notifications')
            .select('*', { count: 'exact' })
            .eq('recipient', recipientId)
            .eq('status', 'OPEN')
            .order('created_on', { ascending: false })
            .order('id', { ascending: false })
            .range(from, to)

        if (error) {
            throw new Error(`Failed to load notifications: ${error.message}`)
        }

        const beans = NotificationRecordSchema.array().parse(data).map(toDomain)

        return { beans, totalSize: count ?? beans.length }
    }

    async markReadByIds(
        recipientId: string,
        notificationIds: readonly number[],
        status: NotificationStatus
    ): Promise<number> {
        const { data, error } = await this.supabase
            .from('notifications')
            .update({ status, modified_on: new Date().toISOString() })
            .eq('recipient', recipientId)
            .in('id', [...notificationIds])
            .select('id')

        if (error) {
            throw new Error(`Failed to update notifications: ${error.message}`)
        }

        return Array.isArray(data) ? data.length : 0
    }

    async findPreference(userId: string, type: string): Promise<NotificationPreference | null> {
        const { data, error } = await this.supabase
            .from('notification_preferences')
            .select('*')
            .eq('user_id', userId)
            .eq('type', type)
            .maybeSingle()

        if (error) {
            throw new Error(`Failed to load notification preference: ${error.message}`)
        }

        if (data === null) {
            return null
        }

        return preferenceToDomain(NotificationPreferenceRecordSchema.parse(data))
    }
}
