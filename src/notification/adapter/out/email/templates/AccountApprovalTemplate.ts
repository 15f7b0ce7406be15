import { z } from 'zod'
import type { NotificationDto } from '../../../../application/domain/model/Notification'
import type { EmailMessage } from '../../../../application/port/out/EmailSenderPort'
import type { DetailRow } from './layout'
import { renderLayout, renderText } from './layout'

/**
 * AccountSignupEvent を JSON にしたペイロードのうち、メールに使う項目
 */
const AccountSignupPayloadSchema = z.object({
    username: z.string(),
    emailAddress: z.string().nullable().optional(),
    firstName: z.string().nullable().optional(),
    surname: z.string().nullable().optional(),
})

/**
 * 新規アカウント承認依頼メール
 */
export function accountApprovalEmail(notification: NotificationDto, to: string): EmailMessage {
    const title = 'A new account needs approval'
    const intro = `Hello ${notification.recipient.fullName}, ${notification.reasonMessage}.`

    const rows: DetailRow[] = []
    const payload = AccountSignupPayloadSchema.safeParse(notification.payload)
    if (payload.success) {
        const fullName = [payload.data.firstName, payload.data.surname].filter(Boolean).join(' ')
        rows.push({ label: 'Username', value: payload.data.username })
        if (fullName) {
            rows.push({ label: 'Name', value: fullName })
        }
        if (payload.data.emailAddress) {
            rows.push({ label: 'Email', value: payload.data.emailAddress })
        }
    }

    return {
        to,
        subject: title,
        html: renderLayout(title, intro, rows),
        text: renderText(title, intro, rows),
    }
}
