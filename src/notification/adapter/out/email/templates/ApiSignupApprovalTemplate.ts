import { z } from 'zod'
import type { NotificationDto } from '../../../../application/domain/model/Notification'
import type { EmailMessage } from '../../../../application/port/out/EmailSenderPort'
import type { DetailRow } from './layout'
import { renderLayout, renderText } from './layout'

const ApiSignupPayloadSchema = z.object({
    organizationId: z.string(),
    apiId: z.string(),
    apiVersion: z.string(),
    planId: z.string(),
    requestedBy: z.string(),
})

/**
 * API 利用申請の承認依頼メール
 */
export function apiSignupApprovalEmail(notification: NotificationDto, to: string): EmailMessage {
    const title = 'API signup awaiting approval'
    const intro = `Hello ${notification.recipient.fullName}, ${notification.reasonMessage}.`

    const rows: DetailRow[] = []
    const payload = ApiSignupPayloadSchema.safeParse(notification.payload)
    if (payload.success) {
        rows.push(
            { label: 'Requested by', value: payload.data.requestedBy },
            { label: 'API', value: `${payload.data.organizationId}/${payload.data.apiId}` },
            { label: 'Version', value: payload.data.apiVersion },
            { label: 'Plan', value: payload.data.planId }
        )
    }

    return {
        to,
        subject: title,
        html: renderLayout(title, intro, rows),
        text: renderText(title, intro, rows),
    }
}
