import { z } from 'zod'

/**
 * users テーブルの行
 */
export const UserRecordSchema = z.object({
    username: z.string(),
    full_name: z.string().nullable(),
    email: z.string().nullable(),
})

export type UserRecord = z.infer<typeof UserRecordSchema>

/**
 * user_roles テーブルの行
 */
export const UserRoleRecordSchema = z.object({
    username: z.string(),
    role: z.string(),
})

export type UserRoleRecord = z.infer<typeof UserRoleRecordSchema>
