import { z } from 'zod'
import { NOTIFICATION_STATUSES } from '../../../../application/domain/model/Notification'

/**
 * 既読化リクエスト（JSON ボディ）
 *
 * status に OPEN を指定するとサービスが 400 を返す。
 */
export const MarkNotificationsWebRequestSchema = z.object({
    notificationIds: z.array(z.number().int().positive()),
    status: z.enum(NOTIFICATION_STATUSES),
})

export type MarkNotificationsWebRequest = z.infer<typeof MarkNotificationsWebRequestSchema>
