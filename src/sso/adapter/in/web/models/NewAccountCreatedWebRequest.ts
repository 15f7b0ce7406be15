import { z } from 'zod'

/**
 * SSO の新規アカウント通知（JSON ボディ）
 *
 * time はオフセット付きの ISO 8601 文字列。
 */
export const NewAccountCreatedWebRequestSchema = z.object({
    userId: z.string().min(1),
    username: z.string().min(1),
    emailAddress: z.string().email().nullish(),
    firstName: z.string().nullish(),
    surname: z.string().nullish(),
    time: z.string().datetime({ offset: true }),
})

export type NewAccountCreatedWebRequest = z.infer<typeof NewAccountCreatedWebRequestSchema>
