import { z } from 'zod'
import { JsonValueSchema } from '../../../../../common/util/json'
import {
    NOTIFICATION_CATEGORIES,
    NOTIFICATION_STATUSES,
} from '../../../../application/domain/model/Notification'

/**
 * notifications テーブルの行
 */
export const NotificationRecordSchema = z.object({
    id: z.number().int(),
    category: z.enum(NOTIFICATION_CATEGORIES),
    reason: z.string(),
    reason_message: z.string(),
    status: z.enum(NOTIFICATION_STATUSES),
    recipient: z.string(),
    source: z.string(),
    payload: JsonValueSchema,
    created_on: z.string(),
    modified_on: z.string(),
})

export type NotificationRecord = z.infer<typeof NotificationRecordSchema>

/**
 * INSERT 用のレコード（id と日時は DB が付ける）
 */
export type NotificationInsertRecord = Omit<NotificationRecord, 'id' | 'created_on' | 'modified_on'>

/**
 * notification_preferences テーブルの行
 */
export const NotificationPreferenceRecordSchema = z.object({
    user_id: z.string(),
    type: z.string(),
    enabled: z.boolean(),
})

export type NotificationPreferenceRecord = z.infer<typeof NotificationPreferenceRecordSchema>
