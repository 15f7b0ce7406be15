import type { JsonValue } from '../../../../common/util/json'
import type { UserDto } from '../../../../security/application/domain/model/User'

export const NOTIFICATION_STATUSES = ['OPEN', 'USER_DISMISSED', 'SYSTEM_DISMISSED'] as const

/**
 * 通知の状態
 *
 * - OPEN: 未読
 * - USER_DISMISSED: ユーザーが既読にした
 * - SYSTEM_DISMISSED: システムが既読にした（承認済みなど）
 */
export type NotificationStatus = (typeof NOTIFICATION_STATUSES)[number]

export const NOTIFICATION_CATEGORIES = [
    'USER_ADMINISTRATION',
    'API_ADMINISTRATION',
    'API_LIFECYCLE',
    'SYSTEM',
    'OTHER',
] as const

export type NotificationCategory = (typeof NOTIFICATION_CATEGORIES)[number]

/**
 * 保存前の通知
 */
export interface NewNotification {
    category: NotificationCategory
    /** ハンドラーが購読する文字列タグ（例: 'api.approval.request'） */
    reason: string
    reasonMessage: string
    status: NotificationStatus
    /** 受信者のユーザー名 */
    recipient: string
    source: string
    payload: JsonValue
}

/**
 * 保存済みの通知
 */
export interface Notification extends NewNotification {
    id: number
    createdOn: Date
    modifiedOn: Date
}

/**
 * ハンドラーや API に渡す通知
 *
 * recipient はユーザー名ではなくユーザー情報。
 */
export interface NotificationDto extends Omit<Notification, 'recipient'> {
    recipient: UserDto
}

/**
 * 通知の宛先の種類
 *
 * - INDIVIDUAL: ユーザー名で1人を指定
 * - ROLE: そのロールを持つ全ユーザー
 */
export type RecipientType = 'INDIVIDUAL' | 'ROLE'

export interface RecipientDto {
    recipient: string
    recipientType: RecipientType
}

/**
 * 通知作成リクエスト（プロデューサーが組み立てる）
 */
export interface CreateNotificationDto {
    recipient: RecipientDto[]
    category: NotificationCategory
    reason: string
    reasonMessage: string
    source: string
    payload: unknown
}

/**
 * 保存済みの通知と受信者情報から DTO を作る
 */
export function toNotificationDto(notification: Notification, recipient: UserDto): NotificationDto {
    return {
        id: notification.id,
        category: notification.category,
        reason: notification.reason,
        reasonMessage: notification.reasonMessage,
        status: notification.status,
        recipient,
        source: notification.source,
        payload: notification.payload,
        createdOn: notification.createdOn,
        modifiedOn: notification.modifiedOn,
    }
}
