/**
 * 通知の受け取り方に関するユーザー設定
 *
 * type は配信手段（例: 'email'）。設定がない場合は有効とみなす。
 */
export interface NotificationPreference {
    userId: string
    type: string
    enabled: boolean
}

export const EMAIL_PREFERENCE_TYPE = 'email'
