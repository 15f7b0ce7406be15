import { Resend } from 'resend'
import type { EmailMessage, EmailSenderPort } from '../../../application/port/out/EmailSenderPort'

/**
 * Resend を使ったメール送信アダプター
 *
 * 【責務】
 * EmailSenderPort インターフェースの実装
 * Resend API を使った実際のメール送信
 */
export class ResendEmailAdapter implements EmailSenderPort {
    private resend: Resend

    constructor(
        apiKey: string,
        private readonly from: string
    ) {
        this.resend = new Resend(apiKey)
        console.log('📮 ResendEmailAdapter initialized')
    }

    async send(message: EmailMessage): Promise<void> {
        console.log(`📧 Sending email to: ${message.to}`)

        const { data, error } = await this.resend.emails.send({
            from: this.from,
            to: message.to,
            subject: message.subject,
            html: message.html,
            text: message.text,
        })

        if (error) {
            console.error('❌ Failed to send email:', error)
            throw new Error(`Email sending failed: ${error.message}`)
        }

        console.log('✅ Email sent successfully:', data?.id)
    }
}
