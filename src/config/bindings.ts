import { z } from 'zod'
import { InvalidConfigurationException } from '../common/exception/InvalidConfigurationException'

const booleanFlag = (defaultValue: 'true' | 'false') =>
    z.enum(['true', 'false']).default(defaultValue).transform((value) => value === 'true')

/**
 * 環境変数のスキーマ
 *
 * 文字列の環境変数をここで型付きの値に変換する。
 */
export const AppBindingsSchema = z
    .object({
        USE_SUPABASE: booleanFlag('false'),
        SUPABASE_URL: z.string().url().optional(),
        SUPABASE_PUBLISHABLE_KEY: z.string().min(1).optional(),
        RESEND_API_KEY: z.string().min(1).optional(),
        EMAIL_FROM: z.string().min(1).default('API Portal <notifications@example.com>'),
        JWT_SECRET: z.string().min(1),
        SSO_EVENT_TOKEN: z.string().min(1),
        ACCOUNT_APPROVAL_REQUIRED: booleanFlag('true'),
        EVENT_SOURCE_URL: z.string().url().default('http://localhost/api'),
        PORT: z.coerce.number().int().positive().default(8787),
    })
    .superRefine((bindings, ctx) => {
        if (!bindings.USE_SUPABASE) {
            return
        }
        if (!bindings.SUPABASE_URL) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['SUPABASE_URL'],
                message: 'SUPABASE_URL is required when USE_SUPABASE=true',
            })
        }
        if (!bindings.SUPABASE_PUBLISHABLE_KEY) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['SUPABASE_PUBLISHABLE_KEY'],
                message: 'SUPABASE_PUBLISHABLE_KEY is required when USE_SUPABASE=true',
            })
        }
    })

export type AppBindings = z.infer<typeof AppBindingsSchema>

/**
 * 環境変数を読み込んで検証する
 *
 * 空文字の変数は未設定として扱う（.env の `KEY=` 行のため）。
 *
 * @throws InvalidConfigurationException 必須項目の欠落や形式エラー
 */
export function loadBindings(source: Record<string, string | undefined>): AppBindings {
    const cleaned = Object.fromEntries(
        Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
    )

    const result = AppBindingsSchema.safeParse(cleaned)

    if (!result.success) {
        const keys = [...new Set(result.error.issues.map((issue) => issue.path.join('.')))]
        throw new InvalidConfigurationException(
            keys,
            result.error.issues.map((issue) => issue.message).join(', ')
        )
    }

    return result.data
}
