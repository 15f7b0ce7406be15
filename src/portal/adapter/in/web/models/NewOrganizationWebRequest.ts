import { z } from 'zod'

/**
 * 組織作成リクエスト（JSON ボディ）
 *
 * 名前から ID を作るので、ID に使える文字を1文字以上含むこと。
 */
export const NewOrganizationWebRequestSchema = z.object({
    name: z
        .string()
        .min(1)
        .max(255)
        .regex(/[A-Za-z0-9\-_.]/, 'name must contain at least one of A-Z a-z 0-9 - _ .'),
    description: z.string().max(512).optional(),
})

export type NewOrganizationWebRequest = z.infer<typeof NewOrganizationWebRequestSchema>
