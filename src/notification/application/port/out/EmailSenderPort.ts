/**
 * 送信するメール
 */
export interface EmailMessage {
    to: string
    subject: string
    html: string
    text: string
}

/**
 * メール送信の窓口（ポート）
 *
 * 【実装】
 * - ResendEmailAdapter: Resend API を使った実装
 * - LoggingEmailAdapter: API キーがない環境用（ログに出すだけ）
 */
export interface EmailSenderPort {
    send(message: EmailMessage): Promise<void>
}

/**
 * DIコンテナ用のトークン
 */
export const EmailSenderPortToken = Symbol('EmailSenderPort')
