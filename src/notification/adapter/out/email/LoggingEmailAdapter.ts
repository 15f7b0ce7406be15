import type { EmailMessage, EmailSenderPort } from '../../../application/port/out/EmailSenderPort'

/**
 * RESEND_API_KEY が設定されていない環境用の送信アダプター
 * 送信する代わりにログに出す
 */
export class LoggingEmailAdapter implements EmailSenderPort {
    send(message: EmailMessage): Promise<void> {
        console.log(`📭 [LoggingEmail] to=${message.to} subject="${message.subject}"`)
        console.debug(message.text)
        return Promise.resolve()
    }
}
